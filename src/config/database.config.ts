import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { Novel } from '../entities/novel.entity';
import { Chapter } from '../entities/chapter.entity';
import { Source } from '../entities/source.entity';
import { Profile } from '../entities/profile.entity';
import { Comment } from '../entities/comment.entity';
import { MIGRATIONS } from '../migrations';

export const ENTITIES = [Novel, Chapter, Source, Profile, Comment];

@Injectable()
export class DatabaseConfig implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService) { }
  createTypeOrmOptions(): TypeOrmModuleOptions {
    return {
      type: 'postgres',
      host: this.configService.get<string>('DB_HOST', 'localhost'),
      port: Number(this.configService.get<string>('DB_PORT', '5432')),
      username: this.configService.get<string>('DB_USERNAME', 'postgres'),
      password: this.configService.get<string>('DB_PASSWORD', 'postgres'),
      database: this.configService.get<string>('DB_NAME', 'inkwell'),
      entities: ENTITIES,
      migrations: MIGRATIONS,
      // 表结构包含生成列、触发器与 trigram 索引，只通过迁移维护
      synchronize: false,
      migrationsRun: false,
      logging: this.configService.get<string>('DB_LOGGING', 'false') === 'true',
      retryAttempts: 3,
      retryDelay: 3000,
      // pg Pool 参数
      extra: {
        max: Number(this.configService.get<string>('DB_POOL_MAX', '25')),
        min: Number(this.configService.get<string>('DB_POOL_MIN', '5')),
        idleTimeoutMillis: 30 * 60 * 1000,
        maxLifetimeSeconds: 60 * 60,
        connectionTimeoutMillis: 5000,
      },
    };
  }
}
