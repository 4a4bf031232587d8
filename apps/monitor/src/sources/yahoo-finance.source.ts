import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { PriceSourceId, SOURCE_LABELS } from '../interfaces/price-reading.interface';
import { PriceSourceException } from '../exceptions';
import { MONITOR_DEFAULTS } from '../config/monitor.defaults';
import { readPath } from '../utils/guards';
import { BaseHttpPriceSource, SourceRequest } from './base.source';

/**
 * Source B: Yahoo Finance chart endpoint, one-minute bars for the current day.
 *
 * The last bar's close is the current price. Bars still forming carry a null
 * close and are skipped.
 */
@Injectable()
export class YahooFinanceSource extends BaseHttpPriceSource {
  readonly id = PriceSourceId.YAHOO_FINANCE;
  readonly name = SOURCE_LABELS[PriceSourceId.YAHOO_FINANCE];

  private static readonly BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

  constructor(httpService: HttpService, configService: ConfigService) {
    super(
      httpService,
      configService.get<number>('SOURCE_TIMEOUT_MS', MONITOR_DEFAULTS.SOURCE_TIMEOUT_MS),
    );
  }

  protected buildRequest(symbol: string): SourceRequest {
    return {
      url: `${YahooFinanceSource.BASE_URL}/${encodeURIComponent(symbol)}`,
      params: {
        interval: '1m',
        range: '1d',
      },
    };
  }

  protected extractPrice(data: unknown, symbol: string): unknown {
    const chartError = readPath(data, ['chart', 'error', 'description']);
    if (typeof chartError === 'string') {
      throw new PriceSourceException(this.name, symbol, chartError);
    }

    const closes = readPath(data, ['chart', 'result', 0, 'indicators', 'quote', 0, 'close']);
    if (!Array.isArray(closes)) {
      throw new PriceSourceException(this.name, symbol, 'No data returned');
    }

    for (let i = closes.length - 1; i >= 0; i--) {
      if (closes[i] !== null && closes[i] !== undefined) {
        return closes[i];
      }
    }

    throw new PriceSourceException(this.name, symbol, 'No data returned');
  }
}
