import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ComparisonRecord } from '../interfaces/comparison-record.interface';
import { MONITOR_DEFAULTS } from '../config/monitor.defaults';
import { CrossValidationFailedEvent, MonitorEvents } from '../events/monitor.events';
import { mean } from '../analytics/statistics';

export type CrossValidationReason =
  | 'within_spread'
  | 'no_baseline'
  | 'genuine_discrepancy'
  | 'both_sources_suspicious'
  | 'source_a_suspicious'
  | 'source_b_suspicious';

export interface CrossValidationResult {
  accepted: boolean;
  reason: CrossValidationReason;
  /** |priceA - priceB| / min(priceA, priceB) */
  spread: number;
}

/**
 * Decides whether a pair of individually valid prices can be trusted together.
 *
 * Small spreads are always accepted. A large spread is judged against each
 * source's own recent average: a source that moved more than the deviation
 * threshold away from its baseline is suspicious.
 */
@Injectable()
export class CrossValidator {
  private readonly logger = new Logger(CrossValidator.name);
  private readonly largeSpreadThreshold: number;
  private readonly deviationThreshold: number;
  private readonly window: number;

  constructor(
    configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.largeSpreadThreshold = configService.get<number>(
      'LARGE_SPREAD_THRESHOLD',
      MONITOR_DEFAULTS.LARGE_SPREAD_THRESHOLD,
    );
    this.deviationThreshold = configService.get<number>(
      'SOURCE_DEVIATION_THRESHOLD',
      MONITOR_DEFAULTS.SOURCE_DEVIATION_THRESHOLD,
    );
    this.window = configService.get<number>(
      'CROSS_VALIDATION_WINDOW',
      MONITOR_DEFAULTS.CROSS_VALIDATION_WINDOW,
    );
  }

  /**
   * @param history Comparison history; filtered to `symbol` here
   */
  check(
    priceA: number,
    priceB: number,
    symbol: string,
    history: readonly ComparisonRecord[],
  ): CrossValidationResult {
    const spread = Math.abs(priceA - priceB) / Math.min(priceA, priceB);
    if (spread <= this.largeSpreadThreshold) {
      return { accepted: true, reason: 'within_spread', spread };
    }

    this.logger.warn(
      `Large price discrepancy detected for ${symbol}: ` +
        `A=$${priceA.toFixed(2)} vs B=$${priceB.toFixed(2)} (${(spread * 100).toFixed(1)}%)`,
    );

    const recent = history.filter(r => r.symbol === symbol).slice(-this.window);
    if (recent.length === 0) {
      return { accepted: true, reason: 'no_baseline', spread };
    }

    const avgA = mean(recent.map(r => r.priceA));
    const avgB = mean(recent.map(r => r.priceB));
    const deviatesA = Math.abs(priceA - avgA) / avgA > this.deviationThreshold;
    const deviatesB = Math.abs(priceB - avgB) / avgB > this.deviationThreshold;

    if (deviatesA && deviatesB) {
      this.logger.error(`Both sources show suspicious prices for ${symbol}`);
      return this.reject(symbol, priceA, priceB, 'both_sources_suspicious', spread);
    }
    if (deviatesA) {
      this.logger.warn(`Source A price suspicious for ${symbol}`);
      return this.reject(symbol, priceA, priceB, 'source_a_suspicious', spread);
    }
    if (deviatesB) {
      this.logger.warn(`Source B price suspicious for ${symbol}`);
      return this.reject(symbol, priceA, priceB, 'source_b_suspicious', spread);
    }

    return { accepted: true, reason: 'genuine_discrepancy', spread };
  }

  private reject(
    symbol: string,
    priceA: number,
    priceB: number,
    reason: CrossValidationReason,
    spread: number,
  ): CrossValidationResult {
    const event: CrossValidationFailedEvent = { symbol, priceA, priceB, reason };
    this.eventEmitter.emit(MonitorEvents.CROSS_VALIDATION_FAILED, event);
    return { accepted: false, reason, spread };
  }
}
