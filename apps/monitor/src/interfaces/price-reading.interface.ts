/**
 * Identifiers of the two providers being reconciled.
 * Source A is the reference side of the discrepancy formula.
 */
export enum PriceSourceId {
  ALPHA_VANTAGE = 'alpha_vantage',
  YAHOO_FINANCE = 'yahoo_finance',
}

/**
 * A single price observation returned by a provider
 */
export interface PriceReading {
  /** Ticker symbol (e.g., 'AAPL') */
  symbol: string;

  /** Provider the reading came from */
  source: PriceSourceId;

  /** Raw price value as returned by the provider, validated downstream */
  price: unknown;

  /** Unix timestamp in milliseconds when the reading was taken */
  observedAt: number;
}

export const SOURCE_LABELS: Record<PriceSourceId, string> = {
  [PriceSourceId.ALPHA_VANTAGE]: 'Alpha Vantage',
  [PriceSourceId.YAHOO_FINANCE]: 'Yahoo Finance',
};
