import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { NOTIFIER, Notifier } from '../interfaces/notifier.interface';
import {
  AlertContent,
  AlertOutcome,
  AlertRecord,
  AlertStats,
  SuppressionReason,
} from '../interfaces/alert.interface';
import { MONITOR_DEFAULTS } from '../config/monitor.defaults';
import { AlertEvaluatedEvent, MonitorEvents } from '../events/monitor.events';
import { mean } from '../analytics/statistics';
import { errorMessage } from '../utils/guards';

/**
 * Alert admission control.
 *
 * Checks run in order and short-circuit: cooldown, threshold, hourly rate
 * limit. Only alerts the notifier accepted are recorded, so a failed send
 * consumes neither cooldown nor rate-limit budget.
 */
@Injectable()
export class AlertGateService {
  private readonly logger = new Logger(AlertGateService.name);
  private readonly alertHistory: AlertRecord[] = [];
  private readonly lastAlertTime = new Map<string, number>();

  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly maxAlertsPerWindow: number;
  private readonly rateWindowMs = MONITOR_DEFAULTS.ALERT_RATE_WINDOW_MS;

  constructor(
    @Inject(NOTIFIER) private readonly notifier: Notifier,
    private readonly eventEmitter: EventEmitter2,
    configService: ConfigService,
  ) {
    this.threshold = configService.get<number>(
      'DISCREPANCY_THRESHOLD',
      MONITOR_DEFAULTS.DISCREPANCY_THRESHOLD,
    );
    this.cooldownMs = configService.get<number>(
      'ALERT_COOLDOWN_MS',
      MONITOR_DEFAULTS.ALERT_COOLDOWN_MS,
    );
    this.maxAlertsPerWindow = configService.get<number>(
      'MAX_ALERTS_PER_HOUR',
      MONITOR_DEFAULTS.MAX_ALERTS_PER_HOUR,
    );
  }

  getThreshold(): number {
    return this.threshold;
  }

  /**
   * Plain threshold test, ignoring cooldown and rate limit
   */
  shouldSendAlert(discrepancyPercent: number): boolean {
    return Math.abs(discrepancyPercent) > this.threshold;
  }

  async evaluateAndMaybeNotify(
    symbol: string,
    discrepancyPercent: number,
    content: Omit<AlertContent, 'symbol' | 'discrepancyPercent' | 'threshold'>,
  ): Promise<AlertOutcome> {
    const outcome = await this.evaluate(symbol, discrepancyPercent, content);

    const event: AlertEvaluatedEvent = { symbol, discrepancyPercent, outcome };
    this.eventEmitter.emit(MonitorEvents.ALERT_EVALUATED, event);
    return outcome;
  }

  getAlertHistory(symbol?: string): AlertRecord[] {
    return symbol === undefined
      ? [...this.alertHistory]
      : this.alertHistory.filter(a => a.symbol === symbol);
  }

  getLastAlertTime(symbol: string): number | null {
    return this.lastAlertTime.get(symbol) ?? null;
  }

  getAlertStats(): AlertStats {
    if (this.alertHistory.length === 0) {
      return { totalAlerts: 0, uniqueSymbols: 0, avgDiscrepancy: 0, maxDiscrepancy: 0 };
    }

    const discrepancies = this.alertHistory.map(a => a.discrepancyPercent);
    return {
      totalAlerts: this.alertHistory.length,
      uniqueSymbols: new Set(this.alertHistory.map(a => a.symbol)).size,
      avgDiscrepancy: mean(discrepancies),
      maxDiscrepancy: Math.max(...discrepancies),
    };
  }

  private async evaluate(
    symbol: string,
    discrepancyPercent: number,
    content: Omit<AlertContent, 'symbol' | 'discrepancyPercent' | 'threshold'>,
  ): Promise<AlertOutcome> {
    const now = Date.now();
    const reason = this.findSuppression(symbol, discrepancyPercent, now);
    if (reason !== null) {
      this.logger.log(`Alert for ${symbol} suppressed: ${reason}`);
      return { status: 'suppressed', reason };
    }

    try {
      await this.notifier.notify({
        ...content,
        symbol,
        discrepancyPercent,
        threshold: this.threshold,
      });
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error(`Error sending alert for ${symbol}: ${error}`);
      return { status: 'failed', error };
    }

    const sentAt = Date.now();
    const record: AlertRecord = {
      timestamp: sentAt,
      symbol,
      discrepancyPercent,
      sent: true,
      alertType: 'threshold_exceeded',
    };
    this.alertHistory.push(Object.freeze(record));
    this.lastAlertTime.set(symbol, sentAt);

    this.logger.log(
      `Alert sent successfully for ${symbol} with ${discrepancyPercent.toFixed(2)}% discrepancy`,
    );
    return { status: 'sent', record };
  }

  private findSuppression(
    symbol: string,
    discrepancyPercent: number,
    now: number,
  ): SuppressionReason | null {
    const lastAlert = this.lastAlertTime.get(symbol);
    if (lastAlert !== undefined && now - lastAlert < this.cooldownMs) {
      return 'cooldown';
    }

    if (!this.shouldSendAlert(discrepancyPercent)) {
      return 'below_threshold';
    }

    const windowStart = now - this.rateWindowMs;
    const recentAlerts = this.alertHistory.filter(
      a => a.symbol === symbol && a.timestamp > windowStart,
    ).length;
    if (recentAlerts >= this.maxAlertsPerWindow) {
      this.logger.warn(`Too many alerts for ${symbol} in the last hour`);
      return 'rate_limit';
    }

    return null;
  }
}
