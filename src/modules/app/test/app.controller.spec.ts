import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from '../app.controller';
import { AppService } from '../app.service';
import { DatabaseInitService } from '../../../config/database-init.service';
import { ModerationQueueService } from '../../moderation/moderation-queue.service';

describe('AppController', () => {
  let appController: AppController;

  type HealthCheckFn = jest.Mock<Promise<boolean>, []>;
  const mockDatabaseInitService: { healthCheck: HealthCheckFn } = {
    healthCheck: jest.fn<Promise<boolean>, []>().mockResolvedValue(true),
  };
  const queueStats = { queued: 4, delivered: 2, failed: 1, skipped: 0, inFlight: 1 };
  const mockQueue = { stats: jest.fn(() => queueStats) };

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        { provide: DatabaseInitService, useValue: mockDatabaseInitService },
        { provide: ModerationQueueService, useValue: mockQueue },
      ],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  describe('root', () => {
    it('reports ok with the database state', async () => {
      await expect(appController.root()).resolves.toEqual({
        status: 'ok',
        database: 'connected',
      });
    });

    it('stays ok when the database is down', async () => {
      mockDatabaseInitService.healthCheck.mockResolvedValueOnce(false);
      await expect(appController.root()).resolves.toEqual({
        status: 'ok',
        database: 'disconnected',
      });
    });
  });

  describe('health check', () => {
    it('should return healthy status with queue counters', async () => {
      const result = await appController.healthCheck();
      expect(result.status).toBe('healthy');
      expect(typeof result.timestamp).toBe('string');
      expect(result.database).toBe('connected');
      expect(result.moderation).toEqual(queueStats);
    });

    it('should return unhealthy status when database is down', async () => {
      mockDatabaseInitService.healthCheck.mockResolvedValueOnce(false);
      const result = await appController.healthCheck();
      expect(result.status).toBe('unhealthy');
      expect(result.database).toBe('disconnected');
    });
  });
});
