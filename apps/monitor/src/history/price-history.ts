import { ComparisonRecord } from '../interfaces/comparison-record.interface';

/**
 * Time-ordered comparison ledger shared by all symbols.
 *
 * Holds at most `capacity` records; once full, each append evicts the oldest.
 */
export class PriceHistory {
  private records: ComparisonRecord[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * @returns the records evicted to stay within capacity
   */
  append(record: ComparisonRecord): ComparisonRecord[] {
    const last = this.records[this.records.length - 1];
    if (last && record.timestamp < last.timestamp) {
      throw new RangeError(
        `Out-of-order record for ${record.symbol}: ${record.timestamp} < ${last.timestamp}`,
      );
    }

    this.records.push(Object.freeze({ ...record }));

    const overflow = this.records.length - this.capacity;
    return overflow > 0 ? this.records.splice(0, overflow) : [];
  }

  all(): readonly ComparisonRecord[] {
    return this.records;
  }

  forSymbol(symbol: string, limit?: number): ComparisonRecord[] {
    const matching = this.records.filter(r => r.symbol === symbol);
    return limit === undefined ? matching : matching.slice(-limit);
  }

  lastForSymbol(symbol: string): ComparisonRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.records[i].symbol === symbol) {
        return this.records[i];
      }
    }
    return undefined;
  }

  symbols(): string[] {
    return [...new Set(this.records.map(r => r.symbol))];
  }

  get size(): number {
    return this.records.length;
  }

  get maxSize(): number {
    return this.capacity;
  }
}
