import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { PriceReconcilerService } from '../../services/price-reconciler.service';
import { MONITOR_DEFAULTS } from '../../config/monitor.defaults';

/**
 * Reports a provider as down after too many consecutive failed fetches.
 * A provider that has not been called yet counts as up.
 */
@Injectable()
export class PriceSourcesHealthIndicator extends HealthIndicator {
  private readonly failureTolerance: number;

  constructor(
    private readonly reconciler: PriceReconcilerService,
    configService: ConfigService,
  ) {
    super();
    this.failureTolerance = configService.get<number>(
      'SOURCE_FAILURE_TOLERANCE',
      MONITOR_DEFAULTS.SOURCE_FAILURE_TOLERANCE,
    );
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const reports = this.reconciler.getSourceHealth();
    const sources: Record<string, { consecutiveFailures: number; lastError: string | null }> = {};
    for (const report of reports) {
      sources[report.source] = {
        consecutiveFailures: report.consecutiveFailures,
        lastError: report.lastError,
      };
    }

    const failing = reports.filter(r => r.consecutiveFailures >= this.failureTolerance);
    if (failing.length === 0) {
      return { [key]: { status: 'up', sources } };
    }

    throw new HealthCheckError('Price sources check failed', {
      [key]: {
        status: 'down',
        message: `Failing: ${failing.map(r => r.name).join(', ')}`,
        sources,
      },
    });
  }
}
