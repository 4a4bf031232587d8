import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HealthCheckError } from '@nestjs/terminus';
import { PriceSourcesHealthIndicator } from './price-sources.health';
import { PriceReconcilerService } from '../../services/price-reconciler.service';
import { PriceSourceId } from '../../interfaces/price-reading.interface';
import { SourceHealthReport } from '../../interfaces/comparison-record.interface';
import { createConfigService } from '../../__mocks__/monitor.fixtures';

describe('PriceSourcesHealthIndicator', () => {
  let indicator: PriceSourcesHealthIndicator;
  let reconciler: { getSourceHealth: jest.Mock };

  const report = (
    source: PriceSourceId,
    name: string,
    consecutiveFailures: number,
    lastError: string | null = null,
  ): SourceHealthReport => ({
    source,
    name,
    lastSuccessAt: null,
    lastFailureAt: null,
    consecutiveFailures,
    lastError,
  });

  beforeEach(async () => {
    reconciler = { getSourceHealth: jest.fn() };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PriceSourcesHealthIndicator,
        { provide: PriceReconcilerService, useValue: reconciler },
        { provide: ConfigService, useValue: createConfigService() },
      ],
    }).compile();

    indicator = module.get<PriceSourcesHealthIndicator>(PriceSourcesHealthIndicator);
  });

  it('should be defined', () => {
    expect(indicator).toBeDefined();
  });

  it('should report up while failures stay under the tolerance', async () => {
    reconciler.getSourceHealth.mockReturnValue([
      report(PriceSourceId.ALPHA_VANTAGE, 'Alpha Vantage', 2, 'timeout'),
      report(PriceSourceId.YAHOO_FINANCE, 'Yahoo Finance', 0),
    ]);

    await expect(indicator.isHealthy('priceSources')).resolves.toEqual({
      priceSources: {
        status: 'up',
        sources: {
          alpha_vantage: { consecutiveFailures: 2, lastError: 'timeout' },
          yahoo_finance: { consecutiveFailures: 0, lastError: null },
        },
      },
    });
  });

  it('should throw HealthCheckError naming the failing sources', async () => {
    reconciler.getSourceHealth.mockReturnValue([
      report(PriceSourceId.ALPHA_VANTAGE, 'Alpha Vantage', 3, 'Request throttled'),
      report(PriceSourceId.YAHOO_FINANCE, 'Yahoo Finance', 0),
    ]);

    const error = await indicator.isHealthy('priceSources').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HealthCheckError);
    expect(error).toMatchObject({
      causes: {
        priceSources: { status: 'down', message: 'Failing: Alpha Vantage' },
      },
    });
  });
});
