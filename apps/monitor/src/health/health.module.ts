import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { PriceSourcesHealthIndicator } from './indicators/price-sources.health';
import { MonitoringModule } from '../modules/monitoring.module';

@Module({
  imports: [TerminusModule, MonitoringModule],
  controllers: [HealthController],
  providers: [PriceSourcesHealthIndicator],
  exports: [PriceSourcesHealthIndicator],
})
export class HealthModule {}
