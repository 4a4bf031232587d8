import { Test, TestingModule } from '@nestjs/testing';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

describe('MetricsController', () => {
  let controller: MetricsController;
  let metricsService: MetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [MetricsController],
      providers: [
        {
          provide: MetricsService,
          useValue: {
            getMetrics: jest
              .fn()
              .mockResolvedValue('# HELP monitor_comparisons_total Recorded price comparisons'),
            getContentType: jest.fn().mockReturnValue('text/plain; version=0.0.4; charset=utf-8'),
          },
        },
      ],
    }).compile();

    controller = module.get<MetricsController>(MetricsController);
    metricsService = module.get<MetricsService>(MetricsService);
  });

  it('should return Prometheus metrics with the registry content type', async () => {
    const res = { setHeader: jest.fn() };

    await expect(controller.getMetrics(res)).resolves.toBe(
      '# HELP monitor_comparisons_total Recorded price comparisons',
    );
    expect(res.setHeader).toHaveBeenCalledWith(
      'Content-Type',
      'text/plain; version=0.0.4; charset=utf-8',
    );
    expect(metricsService.getMetrics).toHaveBeenCalled();
  });
});
