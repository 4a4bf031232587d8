import { Controller, Get, HttpCode, HttpStatus, Query, UsePipes, ValidationPipe } from '@nestjs/common';
import { AlertGateService } from '../services/alert-gate.service';
import { AlertRecord, AlertStats } from '../interfaces/alert.interface';
import { HistoryQueryDto } from '../dto/history-query.dto';

/**
 * - GET /alerts/history - Dispatched alerts, optionally for one symbol
 * - GET /alerts/stats   - Totals, distinct symbols, mean and max discrepancy
 */
@Controller('alerts')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class AlertsController {
  constructor(private readonly alertGate: AlertGateService) {}

  @Get('history')
  @HttpCode(HttpStatus.OK)
  getHistory(@Query() query: HistoryQueryDto): AlertRecord[] {
    const alerts = this.alertGate.getAlertHistory(query.symbol?.toUpperCase());
    return query.limit === undefined ? alerts : alerts.slice(-query.limit);
  }

  @Get('stats')
  @HttpCode(HttpStatus.OK)
  getStats(): AlertStats {
    return this.alertGate.getAlertStats();
  }
}
