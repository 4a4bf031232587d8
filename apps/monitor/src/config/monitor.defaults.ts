/**
 * Default tuning for reconciliation and alerting.
 *
 * Every value can be overridden through the environment variable of the
 * same name (see EnvironmentVariables).
 */
export const MONITOR_DEFAULTS = {
  /** Alert threshold, in percent of source A's price */
  DISCREPANCY_THRESHOLD: 0.5,
  ALERT_COOLDOWN_MS: 5 * 60 * 1000,
  MAX_ALERTS_PER_HOUR: 5,
  ALERT_RATE_WINDOW_MS: 60 * 60 * 1000,

  /** Minimum time between live fetches of one symbol from one source */
  FETCH_CACHE_MS: 12_000,
  MAX_HISTORY_RECORDS: 1000,
  MOVING_AVERAGE_WINDOW: 5,
  TREND_WINDOW: 5,

  /** Cross-validation looks at this many recent records per symbol */
  CROSS_VALIDATION_WINDOW: 5,
  /** Relative spread between sources above which history is consulted */
  LARGE_SPREAD_THRESHOLD: 0.2,
  /** Relative deviation from a source's own recent average considered suspicious */
  SOURCE_DEVIATION_THRESHOLD: 0.1,

  SOURCE_TIMEOUT_MS: 10_000,
  /** Consecutive failures after which a source reports as down */
  SOURCE_FAILURE_TOLERANCE: 3,

  STOCK_SYMBOLS: 'AAPL',
  POLL_INTERVAL_MS: 60_000,
  SMTP_HOST: 'smtp.gmail.com',
  SMTP_PORT: 587,
  PORT: 3000,
} as const;

/**
 * Parse a comma separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}
