import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { MonitorService } from './monitor.service';
import { MONITOR_DEFAULTS, parseList } from '../config/monitor.defaults';
import { errorMessage } from '../utils/guards';

@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  static readonly INTERVAL_NAME = 'price-monitor-poll';

  private readonly logger = new Logger(SchedulerService.name);
  private readonly pollIntervalMs: number;
  private readonly symbols: string[];
  private readonly enabled: boolean;
  private isRunning = false;
  private isPolling = false;
  private lastPollAt: number | null = null;

  constructor(
    configService: ConfigService,
    private readonly monitorService: MonitorService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.pollIntervalMs = configService.get<number>(
      'POLL_INTERVAL_MS',
      MONITOR_DEFAULTS.POLL_INTERVAL_MS,
    );
    this.symbols = parseList(
      configService.get<string>('STOCK_SYMBOLS', MONITOR_DEFAULTS.STOCK_SYMBOLS),
    ).map(s => s.toUpperCase());
    this.enabled = configService.get<boolean>('SCHEDULER_ENABLED', true);

    this.logger.log(`Configured symbols: ${this.symbols.join(', ')}`);
  }

  onModuleInit(): void {
    if (this.enabled) {
      this.startScheduler();
    } else {
      this.logger.log('Scheduler disabled by configuration');
    }
  }

  onModuleDestroy(): void {
    this.stopScheduler();
  }

  startScheduler(): void {
    if (this.isRunning) {
      this.logger.warn('Scheduler is already running');
      return;
    }

    this.logger.log(`Starting price monitor scheduler with interval: ${this.pollIntervalMs}ms`);

    const intervalId = setInterval(() => {
      void this.executePoll();
    }, this.pollIntervalMs);
    this.schedulerRegistry.addInterval(SchedulerService.INTERVAL_NAME, intervalId);
    this.isRunning = true;

    // Execute immediately on startup
    void this.executePoll();

    this.logger.log('Price monitor scheduler started successfully');
  }

  stopScheduler(): void {
    if (!this.isRunning) {
      return;
    }
    this.schedulerRegistry.deleteInterval(SchedulerService.INTERVAL_NAME);
    this.isRunning = false;
    this.logger.log('Price monitor scheduler stopped');
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isSchedulerRunning(): boolean {
    return this.isRunning;
  }

  getIntervalMs(): number {
    return this.pollIntervalMs;
  }

  getSymbols(): string[] {
    return [...this.symbols];
  }

  getLastPollAt(): number | null {
    return this.lastPollAt;
  }

  /**
   * One pass over every configured symbol. A tick that arrives while the
   * previous pass is still running is skipped.
   */
  async executePoll(): Promise<void> {
    if (this.isPolling) {
      this.logger.warn('Previous poll still running, skipping this tick');
      return;
    }

    this.isPolling = true;
    const startTime = Date.now();
    this.logger.log('Scheduled price poll starting...');

    try {
      const outcomes = await this.monitorService.runAll(this.symbols);
      const compared = outcomes.filter(o => o.comparison.ok).length;
      const alerted = outcomes.filter(o => o.alert?.status === 'sent').length;

      this.logger.log(
        `Scheduled price poll completed: ${compared}/${outcomes.length} compared, ` +
          `${alerted} alert(s) sent in ${Date.now() - startTime}ms`,
      );
    } catch (error) {
      this.logger.error(
        `Scheduled price poll failed after ${Date.now() - startTime}ms: ${errorMessage(error)}`,
      );
    } finally {
      this.lastPollAt = Date.now();
      this.isPolling = false;
    }
  }
}
