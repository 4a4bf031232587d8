import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { SchedulerService } from './scheduler.service';
import { MonitorService } from './monitor.service';
import { createConfigService } from '../__mocks__/monitor.fixtures';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('SchedulerService', () => {
  let service: SchedulerService;
  let monitorService: { runAll: jest.Mock };
  let schedulerRegistry: { addInterval: jest.Mock; deleteInterval: jest.Mock };
  let configService: ReturnType<typeof createConfigService>;

  const createService = async (config: Record<string, unknown>) => {
    configService = createConfigService(config);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SchedulerService,
        { provide: MonitorService, useValue: monitorService },
        { provide: SchedulerRegistry, useValue: schedulerRegistry },
        { provide: ConfigService, useValue: configService },
      ],
    }).compile();

    return module.get<SchedulerService>(SchedulerService);
  };

  beforeEach(async () => {
    monitorService = { runAll: jest.fn().mockResolvedValue([]) };
    schedulerRegistry = {
      addInterval: jest.fn(),
      deleteInterval: jest.fn(),
    };
    service = await createService({ POLL_INTERVAL_MS: 1000, STOCK_SYMBOLS: 'aapl, MSFT,,tsla' });
  });

  afterEach(() => {
    // the registry is mocked, so clear the real interval it was handed
    for (const [, intervalId] of schedulerRegistry.addInterval.mock.calls) {
      clearInterval(intervalId);
    }
    jest.clearAllMocks();
  });

  describe('constructor', () => {
    it('should read the poll interval and symbols from config', () => {
      expect(configService.get).toHaveBeenCalledWith('POLL_INTERVAL_MS', 60000);
      expect(service.getIntervalMs()).toBe(1000);
      expect(service.getSymbols()).toEqual(['AAPL', 'MSFT', 'TSLA']);
    });
  });

  describe('startScheduler', () => {
    it('should register the interval and poll immediately', async () => {
      service.startScheduler();
      await flush();

      expect(service.isSchedulerRunning()).toBe(true);
      expect(schedulerRegistry.addInterval).toHaveBeenCalledWith(
        SchedulerService.INTERVAL_NAME,
        expect.anything(),
      );
      expect(monitorService.runAll).toHaveBeenCalledWith(['AAPL', 'MSFT', 'TSLA']);
      expect(service.getLastPollAt()).not.toBeNull();
    });

    it('should not start twice', () => {
      service.startScheduler();
      service.startScheduler();

      expect(schedulerRegistry.addInterval).toHaveBeenCalledTimes(1);
      expect(monitorService.runAll).toHaveBeenCalledTimes(1);
    });
  });

  describe('stopScheduler', () => {
    it('should remove the interval', () => {
      service.startScheduler();
      service.stopScheduler();

      expect(schedulerRegistry.deleteInterval).toHaveBeenCalledWith(SchedulerService.INTERVAL_NAME);
      expect(service.isSchedulerRunning()).toBe(false);
    });

    it('should do nothing when not running', () => {
      service.stopScheduler();

      expect(schedulerRegistry.deleteInterval).not.toHaveBeenCalled();
    });
  });

  describe('lifecycle', () => {
    it('should start on module init', () => {
      service.onModuleInit();

      expect(service.isSchedulerRunning()).toBe(true);
      service.onModuleDestroy();
      expect(service.isSchedulerRunning()).toBe(false);
    });

    it('should stay idle when disabled', async () => {
      service = await createService({ SCHEDULER_ENABLED: false });

      service.onModuleInit();

      expect(service.isSchedulerRunning()).toBe(false);
      expect(schedulerRegistry.addInterval).not.toHaveBeenCalled();
    });
  });

  describe('executePoll', () => {
    it('should skip a tick while the previous poll is running', async () => {
      let finish: () => void = () => undefined;
      monitorService.runAll.mockImplementationOnce(
        () =>
          new Promise<never[]>(resolve => {
            finish = () => resolve([]);
          }),
      );

      const first = service.executePoll();
      await service.executePoll();
      expect(monitorService.runAll).toHaveBeenCalledTimes(1);

      finish();
      await first;
      await service.executePoll();
      expect(monitorService.runAll).toHaveBeenCalledTimes(2);
    });

    it('should survive a failed poll', async () => {
      monitorService.runAll.mockRejectedValueOnce(new Error('unexpected'));

      await expect(service.executePoll()).resolves.toBeUndefined();
      expect(service.getLastPollAt()).not.toBeNull();
    });
  });
});
