import { ComparisonRecord } from '../interfaces/comparison-record.interface';
import { PriceReading, PriceSourceId } from '../interfaces/price-reading.interface';
import { PriceSource } from '../interfaces/price-source.interface';

/** 2024-01-15T14:30:00.000Z */
export const BASE_TIME = 1705329000000;

/**
 * ConfigService stand-in answering from `values`, falling back to the caller's default
 */
export const createConfigService = (values: Record<string, unknown> = {}) => ({
  get: jest.fn((key: string, defaultValue?: unknown) => values[key] ?? defaultValue),
});

export const createEventEmitter = () => ({
  emit: jest.fn().mockReturnValue(true),
});

/**
 * Controllable Date.now(); restored by jest.restoreAllMocks()
 */
export const mockClock = (start: number = BASE_TIME) => {
  let now = start;
  jest.spyOn(Date, 'now').mockImplementation(() => now);
  return {
    advance(ms: number): void {
      now += ms;
    },
    set(time: number): void {
      now = time;
    },
    now(): number {
      return now;
    },
  };
};

export const createRecord = (overrides: Partial<ComparisonRecord> = {}): ComparisonRecord => ({
  timestamp: BASE_TIME,
  symbol: 'AAPL',
  priceA: 100,
  priceB: 100.5,
  discrepancyPercent: 0.5,
  movingAverage: null,
  volatility: null,
  ...overrides,
});

/**
 * Records for one symbol with the given discrepancies, one second apart
 */
export const createSeries = (
  symbol: string,
  discrepancies: number[],
  start: number = BASE_TIME,
): ComparisonRecord[] =>
  discrepancies.map((discrepancyPercent, i) =>
    createRecord({ symbol, discrepancyPercent, timestamp: start + i * 1000 }),
  );

/**
 * PriceSource whose fetch is a jest.fn; answer through `fetch.mockResolvedValue(reading(...))` or `mockImplementation`
 */
export const createPriceSource = (id: PriceSourceId, name: string) => {
  const fetch = jest.fn<Promise<PriceReading>, [string]>();
  const source: PriceSource & { fetch: typeof fetch } = { id, name, fetch };
  return source;
};

export const reading = (
  symbol: string,
  source: PriceSourceId,
  price: unknown,
  observedAt: number = BASE_TIME,
): PriceReading => ({ symbol, source, price, observedAt });
