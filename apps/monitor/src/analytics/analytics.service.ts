import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ComparisonRecord } from '../interfaces/comparison-record.interface';
import {
  AnalyticsSnapshot,
  AnalyticsSummary,
  DiscrepancyTrend,
} from '../interfaces/analytics.interface';
import { MONITOR_DEFAULTS } from '../config/monitor.defaults';
import { isNonDecreasing, isNonIncreasing, mean, sampleStdDev } from './statistics';

/**
 * Rolling discrepancy analytics over the comparison history.
 *
 * Read-only: every figure is recomputed from the history it is given.
 */
@Injectable()
export class AnalyticsService {
  private readonly movingAverageWindow: number;
  private readonly trendWindow = MONITOR_DEFAULTS.TREND_WINDOW;

  constructor(configService: ConfigService) {
    this.movingAverageWindow = configService.get<number>(
      'MOVING_AVERAGE_WINDOW',
      MONITOR_DEFAULTS.MOVING_AVERAGE_WINDOW,
    );
  }

  /**
   * Moving average, volatility and trend for one symbol.
   * All three are null while the symbol has fewer than two records.
   */
  updateAndSummarize(symbol: string, history: readonly ComparisonRecord[]): AnalyticsSnapshot {
    const diffs = this.discrepancies(symbol, history);
    if (diffs.length < 2) {
      return { movingAverage: null, volatility: null, trend: null };
    }

    return {
      movingAverage: mean(diffs.slice(-this.movingAverageWindow)),
      volatility: sampleStdDev(diffs),
      trend: this.classifyTrend(diffs.slice(-this.trendWindow)),
    };
  }

  getSummary(symbol: string, history: readonly ComparisonRecord[]): AnalyticsSummary {
    const diffs = this.discrepancies(symbol, history);
    if (diffs.length === 0) {
      return {
        symbol,
        totalComparisons: 0,
        avgDifference: null,
        maxDifference: null,
        minDifference: null,
        currentTrend: null,
      };
    }

    return {
      symbol,
      totalComparisons: diffs.length,
      avgDifference: mean(diffs),
      maxDifference: Math.max(...diffs),
      minDifference: Math.min(...diffs),
      currentTrend: this.updateAndSummarize(symbol, history).trend,
    };
  }

  /**
   * Flat runs satisfy the non-decreasing test first and classify as increasing
   */
  classifyTrend(values: readonly number[]): DiscrepancyTrend {
    if (isNonDecreasing(values)) return 'increasing';
    if (isNonIncreasing(values)) return 'decreasing';
    return 'fluctuating';
  }

  private discrepancies(symbol: string, history: readonly ComparisonRecord[]): number[] {
    return history.filter(r => r.symbol === symbol).map(r => r.discrepancyPercent);
  }
}
