import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckError,
  HealthCheckResult,
  HealthCheckService,
  HealthIndicatorFunction,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { PriceSourcesHealthIndicator } from './indicators/price-sources.health';
import { SchedulerService } from '../services/scheduler.service';
import { PriceReconcilerService } from '../services/price-reconciler.service';

const bootedAt = Date.now();

export interface MonitorStatus {
  status: string;
  uptimeSeconds: number;
  timestamp: number;
  version: string;
  scheduler: {
    enabled: boolean;
    running: boolean;
    intervalMs: number;
    symbols: string[];
    lastPollAt: number | null;
  };
  trackedSymbols: string[];
  checks: HealthCheckResult;
}

/**
 * Probes and a debugging snapshot.
 *
 * - GET /health - 503 once a price source has failed too many times in a row
 * - GET /ready  - /health plus a running scheduler (unless disabled)
 * - GET /live   - process is up
 * - GET /status - scheduler state, tracked symbols and the /health result
 */
@Controller()
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly priceSources: PriceSourcesHealthIndicator,
    private readonly scheduler: SchedulerService,
    private readonly reconciler: PriceReconcilerService,
  ) {}

  @Get('health')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async check(): Promise<HealthCheckResult> {
    return this.ensureHealthy([this.sourcesCheck()]);
  }

  @Get('ready')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async ready(): Promise<HealthCheckResult> {
    return this.ensureHealthy([this.sourcesCheck(), () => this.schedulerCheck()]);
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('status')
  @HttpCode(HttpStatus.OK)
  async status(): Promise<MonitorStatus> {
    const checks = await this.health.check([this.sourcesCheck()]);
    const now = Date.now();

    return {
      status: checks.status,
      uptimeSeconds: (now - bootedAt) / 1000,
      timestamp: now,
      version: process.env.npm_package_version ?? '0.0.0',
      scheduler: {
        enabled: this.scheduler.isEnabled(),
        running: this.scheduler.isSchedulerRunning(),
        intervalMs: this.scheduler.getIntervalMs(),
        symbols: this.scheduler.getSymbols(),
        lastPollAt: this.scheduler.getLastPollAt(),
      },
      trackedSymbols: this.reconciler.getTrackedSymbols(),
      checks,
    };
  }

  private sourcesCheck(): HealthIndicatorFunction {
    return () => this.priceSources.isHealthy('priceSources');
  }

  private schedulerCheck(): HealthIndicatorResult {
    const running = this.scheduler.isSchedulerRunning();
    if (running || !this.scheduler.isEnabled()) {
      return { scheduler: { status: 'up', running } };
    }
    throw new HealthCheckError('Scheduler check failed', {
      scheduler: { status: 'down', running, message: 'Scheduler is not running' },
    });
  }

  private async ensureHealthy(checks: HealthIndicatorFunction[]): Promise<HealthCheckResult> {
    const result = await this.health.check(checks);
    if (result.status !== 'ok') {
      throw new ServiceUnavailableException(result);
    }
    return result;
  }
}
