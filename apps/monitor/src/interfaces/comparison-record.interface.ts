import { PriceSourceId } from './price-reading.interface';

/**
 * One reconciled comparison between the two providers.
 * Records are frozen on creation and never mutated.
 */
export interface ComparisonRecord {
  /** Unix timestamp in milliseconds when the comparison was recorded */
  readonly timestamp: number;

  readonly symbol: string;

  /** Price from source A (Alpha Vantage) */
  readonly priceA: number;

  /** Price from source B (Yahoo Finance) */
  readonly priceB: number;

  /** |priceA - priceB| / priceA * 100, always relative to source A */
  readonly discrepancyPercent: number;

  /** Moving average of prior discrepancies, null with fewer than 2 prior records */
  readonly movingAverage: number | null;

  /** Sample standard deviation of prior discrepancies, null with fewer than 2 prior records */
  readonly volatility: number | null;
}

export type ReconciliationFailureReason =
  | 'source_unavailable'
  | 'validation_rejected'
  | 'cross_validation_rejected';

export interface ReconciliationSuccess {
  ok: true;
  priceA: number;
  priceB: number;
  discrepancyPercent: number;
  record: ComparisonRecord;
}

/**
 * "No usable comparison this cycle". A normal outcome, not an error.
 */
export interface ReconciliationFailure {
  ok: false;
  priceA: null;
  priceB: null;
  discrepancyPercent: null;
  reason: ReconciliationFailureReason;
}

export type ReconciliationResult = ReconciliationSuccess | ReconciliationFailure;

/**
 * Fetch health of one provider, tracked by the reconciler
 */
export interface SourceHealth {
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  consecutiveFailures: number;
  lastError: string | null;
}

export interface SourceHealthReport extends SourceHealth {
  source: PriceSourceId;
  name: string;
}
