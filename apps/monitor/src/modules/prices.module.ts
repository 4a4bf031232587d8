import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { AlphaVantageSource, YahooFinanceSource } from '../sources';
import { PRICE_SOURCE_A, PRICE_SOURCE_B } from '../interfaces/price-source.interface';
import { PriceValidator } from '../validation/price.validator';
import { CrossValidator } from '../validation/cross.validator';
import { AnalyticsService } from '../analytics/analytics.service';
import { PriceReconcilerService } from '../services/price-reconciler.service';

@Module({
  imports: [
    HttpModule.register({
      maxRedirects: 0,
    }),
  ],
  providers: [
    AlphaVantageSource,
    YahooFinanceSource,
    { provide: PRICE_SOURCE_A, useExisting: AlphaVantageSource },
    { provide: PRICE_SOURCE_B, useExisting: YahooFinanceSource },
    PriceValidator,
    CrossValidator,
    AnalyticsService,
    PriceReconcilerService,
  ],
  exports: [PriceReconcilerService, AnalyticsService],
})
export class PricesModule {}
