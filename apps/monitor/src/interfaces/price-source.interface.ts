import { PriceReading, PriceSourceId } from './price-reading.interface';

/**
 * A provider of current prices for a ticker symbol.
 * Implementations throw PriceSourceException on failure.
 */
export interface PriceSource {
  /** Which side of the comparison this source feeds */
  readonly id: PriceSourceId;

  /** Human readable provider name used in logs */
  readonly name: string;

  fetch(symbol: string): Promise<PriceReading>;
}

export const PRICE_SOURCE_A = Symbol('PRICE_SOURCE_A');
export const PRICE_SOURCE_B = Symbol('PRICE_SOURCE_B');
