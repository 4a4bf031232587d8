import { Module } from '@nestjs/common';
import { PricesModule } from './prices.module';
import { AlertsModule } from './alerts.module';
import { MonitorService } from '../services/monitor.service';
import { SchedulerService } from '../services/scheduler.service';
import { PricesController } from '../controllers/prices.controller';

@Module({
  imports: [PricesModule, AlertsModule],
  controllers: [PricesController],
  providers: [MonitorService, SchedulerService],
  exports: [MonitorService, SchedulerService, PricesModule],
})
export class MonitoringModule {}
