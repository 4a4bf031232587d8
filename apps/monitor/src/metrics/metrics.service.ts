import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';
import {
  AlertEvaluatedEvent,
  ComparisonRecordedEvent,
  CrossValidationFailedEvent,
  CycleCompletedEvent,
  MonitorEvents,
  PriceRejectedEvent,
  SourceFailedEvent,
  SourceFetchedEvent,
} from '../events/monitor.events';

/**
 * Prometheus metrics for the monitor, fed by the diagnostic events.
 * Exposes fetch latency and failures per source, rejections, discrepancies,
 * alert outcomes and cycle duration.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Provider fetches by source and outcome (live, cached, failed) */
  readonly fetchCount: Counter<string>;

  /** Live provider call latency in seconds */
  readonly fetchLatency: Histogram<string>;

  /** Single prices dropped by the price validator */
  readonly priceRejections: Counter<string>;

  /** Price pairs dropped by cross validation */
  readonly crossValidationRejections: Counter<string>;

  /** Recorded comparisons per symbol */
  readonly comparisons: Counter<string>;

  /** Most recent discrepancy percent per symbol */
  readonly lastDiscrepancy: Gauge<string>;

  /** Alert evaluations by outcome (sent, suppressed reason, failed) */
  readonly alerts: Counter<string>;

  /** Full cycle duration in seconds */
  readonly cycleLatency: Histogram<string>;

  constructor() {
    this.register = new Registry();
    this.fetchCount = new Counter({
      name: 'monitor_source_fetches_total',
      help: 'Total number of provider fetches',
      labelNames: ['source', 'outcome'],
      registers: [this.register],
    });
    this.fetchLatency = new Histogram({
      name: 'monitor_source_fetch_duration_seconds',
      help: 'Provider fetch duration in seconds',
      labelNames: ['source'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.register],
    });
    this.priceRejections = new Counter({
      name: 'monitor_price_rejections_total',
      help: 'Prices rejected by single-price validation',
      labelNames: ['source'],
      registers: [this.register],
    });
    this.crossValidationRejections = new Counter({
      name: 'monitor_cross_validation_rejections_total',
      help: 'Price pairs rejected by cross validation',
      labelNames: ['reason'],
      registers: [this.register],
    });
    this.comparisons = new Counter({
      name: 'monitor_comparisons_total',
      help: 'Recorded price comparisons',
      labelNames: ['symbol'],
      registers: [this.register],
    });
    this.lastDiscrepancy = new Gauge({
      name: 'monitor_discrepancy_percent',
      help: 'Most recent discrepancy between the two sources, in percent',
      labelNames: ['symbol'],
      registers: [this.register],
    });
    this.alerts = new Counter({
      name: 'monitor_alerts_total',
      help: 'Alert evaluations by outcome',
      labelNames: ['symbol', 'outcome'],
      registers: [this.register],
    });
    this.cycleLatency = new Histogram({
      name: 'monitor_cycle_duration_seconds',
      help: 'Reconciliation cycle duration in seconds',
      labelNames: ['result'],
      buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [this.register],
    });
    collectDefaultMetrics({ register: this.register, prefix: 'monitor_' });
  }

  @OnEvent(MonitorEvents.SOURCE_FETCHED)
  recordFetch(event: SourceFetchedEvent): void {
    this.fetchCount.inc({ source: event.source, outcome: event.cached ? 'cached' : 'live' }, 1);
    if (!event.cached) {
      this.fetchLatency.observe({ source: event.source }, event.durationMs / 1000);
    }
  }

  @OnEvent(MonitorEvents.SOURCE_FAILED)
  recordFetchFailure(event: SourceFailedEvent): void {
    this.fetchCount.inc({ source: event.source, outcome: 'failed' }, 1);
  }

  @OnEvent(MonitorEvents.PRICE_REJECTED)
  recordPriceRejection(event: PriceRejectedEvent): void {
    this.priceRejections.inc({ source: event.source }, 1);
  }

  @OnEvent(MonitorEvents.CROSS_VALIDATION_FAILED)
  recordCrossValidationFailure(event: CrossValidationFailedEvent): void {
    this.crossValidationRejections.inc({ reason: event.reason }, 1);
  }

  @OnEvent(MonitorEvents.COMPARISON_RECORDED)
  recordComparison(event: ComparisonRecordedEvent): void {
    this.comparisons.inc({ symbol: event.record.symbol }, 1);
    this.lastDiscrepancy.set({ symbol: event.record.symbol }, event.record.discrepancyPercent);
  }

  @OnEvent(MonitorEvents.ALERT_EVALUATED)
  recordAlert(event: AlertEvaluatedEvent): void {
    const { outcome } = event;
    const label = outcome.status === 'suppressed' ? `suppressed_${outcome.reason}` : outcome.status;
    this.alerts.inc({ symbol: event.symbol, outcome: label }, 1);
  }

  @OnEvent(MonitorEvents.CYCLE_COMPLETED)
  recordCycle(event: CycleCompletedEvent): void {
    this.cycleLatency.observe({ result: event.ok ? 'ok' : 'failed' }, event.durationMs / 1000);
  }

  /**
   * Get the Prometheus registry for scraping.
   */
  getRegister(): Registry {
    return this.register;
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  /**
   * Get content type for Prometheus exposition format.
   */
  getContentType(): string {
    return this.register.contentType;
  }
}
