import { PriceSourceId } from '../interfaces/price-reading.interface';
import { ComparisonRecord } from '../interfaces/comparison-record.interface';
import { AlertOutcome } from '../interfaces/alert.interface';

/**
 * Diagnostic event names emitted through EventEmitter2
 */
export const MonitorEvents = {
  SOURCE_FETCHED: 'price.source_fetched',
  PRICE_REJECTED: 'price.rejected',
  SOURCE_FAILED: 'price.source_failed',
  CROSS_VALIDATION_FAILED: 'price.cross_validation_failed',
  COMPARISON_RECORDED: 'price.comparison_recorded',
  ALERT_EVALUATED: 'alert.evaluated',
  CYCLE_COMPLETED: 'monitor.cycle_completed',
} as const;

export interface SourceFetchedEvent {
  symbol: string;
  source: PriceSourceId;
  /** True when the price was reused from history instead of fetched */
  cached: boolean;
  durationMs: number;
}

export interface PriceRejectedEvent {
  symbol: string;
  source: PriceSourceId;
  reason: string;
}

export interface SourceFailedEvent {
  symbol: string;
  source: PriceSourceId;
  error: string;
}

export interface CrossValidationFailedEvent {
  symbol: string;
  priceA: number;
  priceB: number;
  reason: string;
}

export interface ComparisonRecordedEvent {
  record: ComparisonRecord;
  cached: PriceSourceId[];
}

export interface AlertEvaluatedEvent {
  symbol: string;
  discrepancyPercent: number;
  outcome: AlertOutcome;
}

export interface CycleCompletedEvent {
  symbol: string;
  ok: boolean;
  durationMs: number;
}
