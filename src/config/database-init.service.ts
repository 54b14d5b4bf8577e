import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ConfigService } from '@nestjs/config';

@Injectable()
export class DatabaseInitService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseInitService.name);

  constructor(
    @InjectDataSource()
    private dataSource: DataSource,
    private configService: ConfigService,
  ) { }

  async onModuleInit() {
    // 在测试环境中跳过自动初始化
    const nodeEnv = this.configService.get<string>('NODE_ENV');

    if (nodeEnv === 'test') {
      this.logger.log('Skipping database initialization in test environment');
      return;
    }

    await this.initializeDatabase();
  }

  private async initializeDatabase() {
    try {
      this.logger.log('Initializing database connection...');

      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
        this.logger.log('Database connection initialized successfully');
      }

      const applied = await this.dataSource.runMigrations({ transaction: 'each' });
      this.logger.log(
        applied.length
          ? `Applied migrations: ${applied.map((m) => m.name).join(', ')}`
          : 'Database schema is up to date',
      );
    } catch (error) {
      this.logger.error('Failed to initialize database:', error);
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Database health check failed:', error);
      return false;
    }
  }
}
