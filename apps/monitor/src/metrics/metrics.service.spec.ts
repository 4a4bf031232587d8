import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from './metrics.service';
import { PriceSourceId } from '../interfaces/price-reading.interface';
import { createRecord } from '../__mocks__/monitor.fixtures';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricsService],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('fetches', () => {
    it('should count live, cached and failed fetches per source', async () => {
      service.recordFetch({ symbol: 'AAPL', source: PriceSourceId.ALPHA_VANTAGE, cached: false, durationMs: 250 });
      service.recordFetch({ symbol: 'AAPL', source: PriceSourceId.ALPHA_VANTAGE, cached: true, durationMs: 0 });
      service.recordFetch({ symbol: 'MSFT', source: PriceSourceId.ALPHA_VANTAGE, cached: true, durationMs: 0 });
      service.recordFetchFailure({ symbol: 'AAPL', source: PriceSourceId.YAHOO_FINANCE, error: 'boom' });

      const { values } = await service.fetchCount.get();
      const count = (source: string, outcome: string) =>
        values.find(v => v.labels.source === source && v.labels.outcome === outcome)?.value;

      expect(count('alpha_vantage', 'live')).toBe(1);
      expect(count('alpha_vantage', 'cached')).toBe(2);
      expect(count('yahoo_finance', 'failed')).toBe(1);
    });

    it('should only time live fetches', async () => {
      service.recordFetch({ symbol: 'AAPL', source: PriceSourceId.YAHOO_FINANCE, cached: false, durationMs: 250 });
      service.recordFetch({ symbol: 'AAPL', source: PriceSourceId.YAHOO_FINANCE, cached: true, durationMs: 0 });

      const { values } = await service.fetchLatency.get();
      const sum = values.find(v => v.metricName === 'monitor_source_fetch_duration_seconds_sum');
      const count = values.find(v => v.metricName === 'monitor_source_fetch_duration_seconds_count');

      expect(sum?.value).toBe(0.25);
      expect(count?.value).toBe(1);
    });
  });

  describe('rejections', () => {
    it('should count price and cross-validation rejections', async () => {
      service.recordPriceRejection({ symbol: 'AAPL', source: PriceSourceId.ALPHA_VANTAGE, reason: 'price is zero' });
      service.recordCrossValidationFailure({
        symbol: 'AAPL',
        priceA: 150,
        priceB: 101,
        reason: 'source_a_suspicious',
      });

      const prices = await service.priceRejections.get();
      const pairs = await service.crossValidationRejections.get();

      expect(prices.values).toEqual([{ value: 1, labels: { source: 'alpha_vantage' } }]);
      expect(pairs.values).toEqual([{ value: 1, labels: { reason: 'source_a_suspicious' } }]);
    });
  });

  describe('comparisons', () => {
    it('should count comparisons and track the latest discrepancy', async () => {
      service.recordComparison({ record: createRecord({ symbol: 'AAPL', discrepancyPercent: 0.4 }), cached: [] });
      service.recordComparison({ record: createRecord({ symbol: 'AAPL', discrepancyPercent: 0.9 }), cached: [] });

      const comparisons = await service.comparisons.get();
      const discrepancy = await service.lastDiscrepancy.get();

      expect(comparisons.values).toEqual([{ value: 2, labels: { symbol: 'AAPL' } }]);
      expect(discrepancy.values).toEqual([{ value: 0.9, labels: { symbol: 'AAPL' } }]);
    });
  });

  describe('alerts', () => {
    it('should label alert outcomes', async () => {
      service.recordAlert({
        symbol: 'XYZ',
        discrepancyPercent: 0.8,
        outcome: {
          status: 'sent',
          record: { timestamp: 1, symbol: 'XYZ', discrepancyPercent: 0.8, sent: true, alertType: 'threshold_exceeded' },
        },
      });
      service.recordAlert({
        symbol: 'XYZ',
        discrepancyPercent: 0.8,
        outcome: { status: 'suppressed', reason: 'cooldown' },
      });
      service.recordAlert({ symbol: 'XYZ', discrepancyPercent: 0.8, outcome: { status: 'failed', error: 'smtp' } });

      const { values } = await service.alerts.get();
      expect(values.map(v => v.labels.outcome)).toEqual(['sent', 'suppressed_cooldown', 'failed']);
      expect(values.every(v => v.value === 1 && v.labels.symbol === 'XYZ')).toBe(true);
    });
  });

  describe('cycles', () => {
    it('should time cycles by result', async () => {
      service.recordCycle({ symbol: 'AAPL', ok: true, durationMs: 500 });
      service.recordCycle({ symbol: 'AAPL', ok: false, durationMs: 100 });

      const { values } = await service.cycleLatency.get();
      const count = (result: string) =>
        values.find(
          v => v.metricName === 'monitor_cycle_duration_seconds_count' && v.labels.result === result,
        )?.value;

      expect(count('ok')).toBe(1);
      expect(count('failed')).toBe(1);
    });
  });

  describe('getMetrics', () => {
    it('should return Prometheus text format', async () => {
      const metrics = await service.getMetrics();
      expect(metrics).toContain('# HELP monitor_source_fetches_total Total number of provider fetches');
      // Default Node.js metrics are also collected
      expect(metrics).toContain('monitor_process_cpu_user_seconds_total');
    });

    it('should expose the registry content type', () => {
      expect(service.getContentType()).toBe(service.getRegister().contentType);
    });
  });
});
