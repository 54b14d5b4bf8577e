import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { DatabaseInitService } from './database-init.service';

describe('DatabaseInitService', () => {
  let service: DatabaseInitService;

  const mockDataSource = {
    isInitialized: true,
    initialize: jest.fn<Promise<void>, []>(),
    runMigrations: jest.fn<Promise<Array<{ name: string }>>, [object?]>(),
    query: jest.fn<Promise<unknown>, [string]>(),
  };

  const mockConfigService = {
    get: jest.fn<string | undefined, [string]>(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DatabaseInitService,
        {
          provide: DataSource,
          useValue: mockDataSource,
        },
        {
          provide: ConfigService,
          useValue: mockConfigService,
        },
      ],
    }).compile();

    service = module.get<DatabaseInitService>(DatabaseInitService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('healthCheck', () => {
    it('should return true when database is healthy', async () => {
      mockDataSource.query.mockResolvedValue([{ '?column?': 1 }]);

      const result = await service.healthCheck();

      expect(result).toBe(true);
      expect(mockDataSource.query).toHaveBeenCalledWith('SELECT 1');
    });

    it('should return false when database is unhealthy', async () => {
      mockDataSource.query.mockRejectedValue(new Error('Connection failed'));

      const result = await service.healthCheck();
      expect(result).toBe(false);
      expect(mockDataSource.query).toHaveBeenCalledWith('SELECT 1');
    });
  });

  describe('onModuleInit', () => {
    it('should skip initialization in test environment', async () => {
      mockConfigService.get.mockReturnValue('test');

      await service.onModuleInit();

      expect(mockDataSource.initialize).not.toHaveBeenCalled();
      expect(mockDataSource.runMigrations).not.toHaveBeenCalled();
    });

    it('should initialize database and run migrations when not initialized', async () => {
      mockConfigService.get.mockReturnValue('development');
      mockDataSource.isInitialized = false;
      mockDataSource.initialize.mockResolvedValue(undefined);
      mockDataSource.runMigrations.mockResolvedValue([
        { name: 'InitCatalog1710000000000' },
      ]);

      await service.onModuleInit();

      expect(mockDataSource.initialize).toHaveBeenCalled();
      expect(mockDataSource.runMigrations).toHaveBeenCalledWith({
        transaction: 'each',
      });
    });

    it('should skip initialization when already initialized', async () => {
      mockConfigService.get.mockReturnValue('development');
      mockDataSource.isInitialized = true;
      mockDataSource.runMigrations.mockResolvedValue([]);

      await service.onModuleInit();

      expect(mockDataSource.initialize).not.toHaveBeenCalled();
      expect(mockDataSource.runMigrations).toHaveBeenCalled();
    });

    it('should propagate initialization errors', async () => {
      mockConfigService.get.mockReturnValue('development');
      mockDataSource.isInitialized = false;
      mockDataSource.initialize.mockRejectedValue(new Error('Init failed'));

      await expect(service.onModuleInit()).rejects.toThrow('Init failed');
    });
  });
});
