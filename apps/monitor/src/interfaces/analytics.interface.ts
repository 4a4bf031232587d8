export type DiscrepancyTrend = 'increasing' | 'decreasing' | 'fluctuating';

/**
 * Rolling statistics derived from a symbol's comparison history
 */
export interface AnalyticsSnapshot {
  movingAverage: number | null;
  volatility: number | null;
  trend: DiscrepancyTrend | null;
}

/**
 * On-demand summary over every retained comparison for a symbol
 */
export interface AnalyticsSummary {
  symbol: string;
  totalComparisons: number;
  avgDifference: number | null;
  maxDifference: number | null;
  minDifference: number | null;
  currentTrend: DiscrepancyTrend | null;
}
