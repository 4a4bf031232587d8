import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PriceSourceId } from '../interfaces/price-reading.interface';
import { MonitorEvents, PriceRejectedEvent } from '../events/monitor.events';

const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;

/**
 * Sanity checks a single raw price before it is trusted.
 *
 * Rejections are reported on the `price.rejected` channel and as a `null`
 * result; nothing is thrown.
 */
@Injectable()
export class PriceValidator {
  private readonly logger = new Logger(PriceValidator.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  validate(raw: unknown, source: PriceSourceId, symbol: string): number | null {
    const reason = this.findProblem(raw);
    if (reason !== null) {
      this.logger.warn(`Invalid price from ${source} for ${symbol}: ${reason}`);
      const event: PriceRejectedEvent = { symbol, source, reason };
      this.eventEmitter.emit(MonitorEvents.PRICE_REJECTED, event);
      return null;
    }
    return this.toNumber(raw);
  }

  private findProblem(raw: unknown): string | null {
    if (raw === null || raw === undefined) {
      return 'price is missing';
    }
    const value = this.toNumber(raw);
    if (value === null) {
      return `price is not numeric: ${JSON.stringify(raw)}`;
    }
    if (!Number.isFinite(value)) {
      return 'price is not finite';
    }
    if (value === 0) {
      return 'price is zero';
    }
    if (value < 0) {
      return 'price is negative';
    }
    return null;
  }

  /**
   * Numbers pass through; strings must be plain decimals (no hex, binary or exponent)
   */
  private toNumber(raw: unknown): number | null {
    if (typeof raw === 'number') {
      return Number.isNaN(raw) ? null : raw;
    }
    if (typeof raw === 'string') {
      const trimmed = raw.trim();
      return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : null;
    }
    return null;
  }
}
