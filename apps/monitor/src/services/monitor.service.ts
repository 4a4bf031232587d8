import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PriceReconcilerService } from './price-reconciler.service';
import { AlertGateService } from './alert-gate.service';
import { ReconciliationResult } from '../interfaces/comparison-record.interface';
import { AlertOutcome } from '../interfaces/alert.interface';
import { CycleCompletedEvent, MonitorEvents } from '../events/monitor.events';
import { KeyedLock } from '../utils/keyed-lock';

export interface CycleOutcome {
  symbol: string;
  comparison: ReconciliationResult;
  /** Null when there was no usable comparison to alert on */
  alert: AlertOutcome | null;
}

/**
 * Runs complete monitoring cycles: reconcile, then gate the alert.
 *
 * Cycles for one symbol never overlap, whether triggered by the scheduler or
 * over HTTP, so the history and alert windows see atomic read-then-write.
 */
@Injectable()
export class MonitorService {
  private readonly logger = new Logger(MonitorService.name);
  private readonly lock = new KeyedLock();

  constructor(
    private readonly reconciler: PriceReconcilerService,
    private readonly alertGate: AlertGateService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async runCycle(symbol: string): Promise<CycleOutcome> {
    const normalized = symbol.trim().toUpperCase();
    return this.lock.run(normalized, () => this.execute(normalized));
  }

  /**
   * One symbol at a time, in order
   */
  async runAll(symbols: string[]): Promise<CycleOutcome[]> {
    const outcomes: CycleOutcome[] = [];
    for (const symbol of symbols) {
      outcomes.push(await this.runCycle(symbol));
    }
    return outcomes;
  }

  isRunning(symbol: string): boolean {
    return this.lock.isLocked(symbol.trim().toUpperCase());
  }

  private async execute(symbol: string): Promise<CycleOutcome> {
    const startTime = Date.now();
    const comparison = await this.reconciler.getPriceComparison(symbol);

    let alert: AlertOutcome | null = null;
    if (comparison.ok) {
      alert = await this.alertGate.evaluateAndMaybeNotify(symbol, comparison.discrepancyPercent, {
        priceA: comparison.priceA,
        priceB: comparison.priceB,
        timestamp: comparison.record.timestamp,
      });
    }

    const durationMs = Date.now() - startTime;
    this.logger.debug(
      `Cycle for ${symbol} finished in ${durationMs}ms ` +
        `(${comparison.ok ? 'ok' : comparison.reason}, alert: ${alert?.status ?? 'none'})`,
    );

    const event: CycleCompletedEvent = { symbol, ok: comparison.ok, durationMs };
    this.eventEmitter.emit(MonitorEvents.CYCLE_COMPLETED, event);

    return { symbol, comparison, alert };
  }
}
