import { Controller, Get, HttpCode, HttpStatus, Res } from '@nestjs/common';
import type { Response } from 'express';
import { MetricsService } from './metrics.service';

@Controller()
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * Prometheus scrape endpoint, served with the registry's own content type
   */
  @Get('metrics')
  @HttpCode(HttpStatus.OK)
  async getMetrics(@Res({ passthrough: true }) res: Pick<Response, 'setHeader'>): Promise<string> {
    res.setHeader('Content-Type', this.metricsService.getContentType());
    return this.metricsService.getMetrics();
  }
}
