import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { PriceReconcilerService } from '../services/price-reconciler.service';
import { CycleOutcome, MonitorService } from '../services/monitor.service';
import { ComparisonRecord } from '../interfaces/comparison-record.interface';
import { AnalyticsSummary } from '../interfaces/analytics.interface';
import { HistoryQueryDto, SymbolParamDto } from '../dto/history-query.dto';

/**
 * Read model over the comparison history, plus an on-demand cycle trigger.
 *
 * - GET  /prices/history          - Comparison records, optionally for one symbol
 * - GET  /prices/:symbol/summary  - Analytics summary for a symbol
 * - POST /prices/:symbol/compare  - Run one reconciliation cycle now
 */
@Controller('prices')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class PricesController {
  constructor(
    private readonly reconciler: PriceReconcilerService,
    private readonly monitorService: MonitorService,
  ) {}

  @Get('history')
  @HttpCode(HttpStatus.OK)
  getHistory(@Query() query: HistoryQueryDto): ComparisonRecord[] {
    return this.reconciler.getHistoricalComparison(query.symbol?.toUpperCase(), query.limit);
  }

  @Get(':symbol/summary')
  @HttpCode(HttpStatus.OK)
  getSummary(@Param() params: SymbolParamDto): AnalyticsSummary {
    return this.reconciler.getAnalyticsSummary(params.symbol.toUpperCase());
  }

  @Post(':symbol/compare')
  @HttpCode(HttpStatus.OK)
  compare(@Param() params: SymbolParamDto): Promise<CycleOutcome> {
    return this.monitorService.runCycle(params.symbol);
  }
}
