import { Injectable } from '@nestjs/common';
import { DatabaseInitService } from '../../config/database-init.service';
import {
  ModerationQueueService,
  ModerationQueueStats,
} from '../moderation/moderation-queue.service';

export type DatabaseState = 'connected' | 'disconnected';

export interface RootStatus {
  status: 'ok';
  database: DatabaseState;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  database: DatabaseState;
  moderation: ModerationQueueStats;
}

@Injectable()
export class AppService {
  constructor(
    private readonly databaseInitService: DatabaseInitService,
    private readonly moderationQueue: ModerationQueueService,
  ) {}

  private async databaseState(): Promise<DatabaseState> {
    return (await this.databaseInitService.healthCheck()) ? 'connected' : 'disconnected';
  }

  async root(): Promise<RootStatus> {
    return { status: 'ok', database: await this.databaseState() };
  }

  async health(): Promise<HealthStatus> {
    const database = await this.databaseState();
    return {
      status: database === 'connected' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      database,
      moderation: this.moderationQueue.stats(),
    };
  }
}
