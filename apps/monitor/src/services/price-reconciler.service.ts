import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  PRICE_SOURCE_A,
  PRICE_SOURCE_B,
  PriceSource,
} from '../interfaces/price-source.interface';
import { PriceSourceId } from '../interfaces/price-reading.interface';
import {
  ComparisonRecord,
  ReconciliationFailure,
  ReconciliationFailureReason,
  ReconciliationResult,
  SourceHealth,
  SourceHealthReport,
} from '../interfaces/comparison-record.interface';
import { AnalyticsSummary } from '../interfaces/analytics.interface';
import { PriceValidator } from '../validation/price.validator';
import { CrossValidator } from '../validation/cross.validator';
import { AnalyticsService } from '../analytics/analytics.service';
import { PriceHistory } from '../history/price-history';
import { MONITOR_DEFAULTS } from '../config/monitor.defaults';
import {
  ComparisonRecordedEvent,
  MonitorEvents,
  SourceFailedEvent,
  SourceFetchedEvent,
} from '../events/monitor.events';
import { errorMessage } from '../utils/guards';

type Side = 'A' | 'B';

interface AcquiredPrice {
  price: number | null;
  /** True when a network call was made for this price */
  live: boolean;
  failure?: ReconciliationFailureReason;
}

/**
 * Price Reconciler
 *
 * Runs one fetch cycle for a symbol: both sources (concurrently, with
 * per-source caching), single-price validation, cross-validation, analytics
 * and the append to the comparison history.
 *
 * Owns the comparison history and the last-fetch times.
 */
@Injectable()
export class PriceReconcilerService {
  private readonly logger = new Logger(PriceReconcilerService.name);
  private readonly history: PriceHistory;
  private readonly lastFetchTime = new Map<string, number>();
  private readonly sourceHealth = new Map<PriceSourceId, SourceHealth>();
  private readonly fetchCacheMs: number;

  constructor(
    @Inject(PRICE_SOURCE_A) private readonly sourceA: PriceSource,
    @Inject(PRICE_SOURCE_B) private readonly sourceB: PriceSource,
    private readonly priceValidator: PriceValidator,
    private readonly crossValidator: CrossValidator,
    private readonly analyticsService: AnalyticsService,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.fetchCacheMs = configService.get<number>('FETCH_CACHE_MS', MONITOR_DEFAULTS.FETCH_CACHE_MS);
    this.history = new PriceHistory(
      configService.get<number>('MAX_HISTORY_RECORDS', MONITOR_DEFAULTS.MAX_HISTORY_RECORDS),
    );
  }

  /**
   * Compare the two providers for `symbol`.
   *
   * A failed result is a normal outcome ("no usable comparison this cycle"),
   * never an exception.
   */
  async getPriceComparison(symbol: string): Promise<ReconciliationResult> {
    const [a, b] = await Promise.all([
      this.acquire('A', symbol),
      this.acquire('B', symbol),
    ]);

    if (a.price === null || b.price === null) {
      const reason =
        a.failure === 'source_unavailable' || b.failure === 'source_unavailable'
          ? 'source_unavailable'
          : 'validation_rejected';
      this.logger.warn(`No usable comparison for ${symbol}: ${reason}`);
      return this.failed(reason);
    }

    const check = this.crossValidator.check(a.price, b.price, symbol, this.history.all());
    if (!check.accepted) {
      this.logger.warn(`Price validation failed for ${symbol}: ${check.reason}`);
      return this.failed('cross_validation_rejected');
    }

    const record = this.record(symbol, a.price, b.price);
    for (const [side, acquired] of [['A', a], ['B', b]] as const) {
      if (acquired.live) {
        this.lastFetchTime.set(this.cacheKey(this.source(side).id, symbol), record.timestamp);
      }
    }

    const event: ComparisonRecordedEvent = {
      record,
      cached: [a.live ? null : this.sourceA.id, b.live ? null : this.sourceB.id].filter(
        (id): id is PriceSourceId => id !== null,
      ),
    };
    this.eventEmitter.emit(MonitorEvents.COMPARISON_RECORDED, event);

    return {
      ok: true,
      priceA: record.priceA,
      priceB: record.priceB,
      discrepancyPercent: record.discrepancyPercent,
      record,
    };
  }

  /**
   * Comparison history, optionally for one symbol and limited to the most recent entries
   */
  getHistoricalComparison(symbol?: string, limit?: number): ComparisonRecord[] {
    if (symbol !== undefined) {
      return this.history.forSymbol(symbol, limit);
    }
    const all = [...this.history.all()];
    return limit === undefined ? all : all.slice(-limit);
  }

  getAnalyticsSummary(symbol: string): AnalyticsSummary {
    return this.analyticsService.getSummary(symbol, this.history.all());
  }

  getTrackedSymbols(): string[] {
    return this.history.symbols();
  }

  getSourceHealth(): SourceHealthReport[] {
    return [this.sourceA, this.sourceB].map(source => ({
      source: source.id,
      name: source.name,
      ...this.healthOf(source.id),
    }));
  }

  /**
   * Fetch one side's price, or reuse it from the symbol's last record while
   * that source's fetch cache is fresh
   */
  private async acquire(side: Side, symbol: string): Promise<AcquiredPrice> {
    const source = this.source(side);
    const startTime = Date.now();
    const lastFetch = this.lastFetchTime.get(this.cacheKey(source.id, symbol));

    if (lastFetch !== undefined && startTime - lastFetch < this.fetchCacheMs) {
      const last = this.history.lastForSymbol(symbol);
      if (!last) {
        this.logger.warn(`No cached ${source.name} price left for ${symbol}`);
        return { price: null, live: false, failure: 'source_unavailable' };
      }
      this.logger.debug(`Using cached ${source.name} data for ${symbol}`);
      this.emitFetched(symbol, source.id, true, 0);
      return { price: side === 'A' ? last.priceA : last.priceB, live: false };
    }

    try {
      const reading = await source.fetch(symbol);
      this.markSuccess(source.id);
      this.emitFetched(symbol, source.id, false, Date.now() - startTime);

      const price = this.priceValidator.validate(reading.price, source.id, symbol);
      if (price === null) {
        return { price: null, live: true, failure: 'validation_rejected' };
      }
      this.logger.log(`Successfully fetched ${source.name} price for ${symbol}: $${price}`);
      return { price, live: true };
    } catch (err) {
      const message = errorMessage(err);
      this.markFailure(source.id, message);
      this.logger.error(`Error fetching ${source.name} data for ${symbol}: ${message}`);

      const event: SourceFailedEvent = { symbol, source: source.id, error: message };
      this.eventEmitter.emit(MonitorEvents.SOURCE_FAILED, event);
      return { price: null, live: true, failure: 'source_unavailable' };
    }
  }

  private record(symbol: string, priceA: number, priceB: number): ComparisonRecord {
    const all = this.history.all();
    const analytics = this.analyticsService.updateAndSummarize(symbol, all);
    const discrepancyPercent = (Math.abs(priceA - priceB) / priceA) * 100;
    const previous = all[all.length - 1];

    const record: ComparisonRecord = {
      timestamp: Math.max(Date.now(), previous ? previous.timestamp : 0),
      symbol,
      priceA,
      priceB,
      discrepancyPercent,
      movingAverage: analytics.movingAverage,
      volatility: analytics.volatility,
    };
    this.history.append(record);

    this.logger.log(
      `Price comparison for ${symbol}: A=$${priceA.toFixed(2)}, B=$${priceB.toFixed(2)}, ` +
        `Diff=${discrepancyPercent.toFixed(2)}%, MA=${this.format(analytics.movingAverage, '%')}, ` +
        `Vol=${this.format(analytics.volatility)}, Trend=${analytics.trend ?? 'n/a'}`,
    );

    return this.history.lastForSymbol(symbol) ?? record;
  }

  private failed(reason: ReconciliationFailureReason): ReconciliationFailure {
    return { ok: false, priceA: null, priceB: null, discrepancyPercent: null, reason };
  }

  private source(side: Side): PriceSource {
    return side === 'A' ? this.sourceA : this.sourceB;
  }

  private cacheKey(source: PriceSourceId, symbol: string): string {
    return `${source}:${symbol}`;
  }

  private healthOf(id: PriceSourceId): SourceHealth {
    let health = this.sourceHealth.get(id);
    if (!health) {
      health = { lastSuccessAt: null, lastFailureAt: null, consecutiveFailures: 0, lastError: null };
      this.sourceHealth.set(id, health);
    }
    return health;
  }

  private markSuccess(id: PriceSourceId): void {
    const health = this.healthOf(id);
    health.lastSuccessAt = Date.now();
    health.consecutiveFailures = 0;
    health.lastError = null;
  }

  private markFailure(id: PriceSourceId, message: string): void {
    const health = this.healthOf(id);
    health.lastFailureAt = Date.now();
    health.consecutiveFailures++;
    health.lastError = message;
  }

  private emitFetched(
    symbol: string,
    source: PriceSourceId,
    cached: boolean,
    durationMs: number,
  ): void {
    const event: SourceFetchedEvent = { symbol, source, cached, durationMs };
    this.eventEmitter.emit(MonitorEvents.SOURCE_FETCHED, event);
  }

  private format(value: number | null, suffix = ''): string {
    return value === null ? 'n/a' : `${value.toFixed(2)}${suffix}`;
  }
}
