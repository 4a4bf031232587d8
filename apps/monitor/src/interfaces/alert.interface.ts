export type AlertType = 'threshold_exceeded';

export type SuppressionReason = 'cooldown' | 'below_threshold' | 'rate_limit';

/**
 * Everything a notifier needs to describe a discrepancy alert
 */
export interface AlertContent {
  symbol: string;
  priceA: number;
  priceB: number;
  discrepancyPercent: number;
  /** Configured threshold, in percent */
  threshold: number;
  /** Unix timestamp in milliseconds of the observation */
  timestamp: number;
}

/**
 * Ledger entry for an alert the notifier accepted
 */
export interface AlertRecord {
  readonly timestamp: number;
  readonly symbol: string;
  readonly discrepancyPercent: number;
  readonly sent: boolean;
  readonly alertType: AlertType;
}

export type AlertOutcome =
  | { status: 'sent'; record: AlertRecord }
  | { status: 'suppressed'; reason: SuppressionReason }
  | { status: 'failed'; error: string };

export interface AlertStats {
  totalAlerts: number;
  uniqueSymbols: number;
  avgDiscrepancy: number;
  maxDiscrepancy: number;
}
