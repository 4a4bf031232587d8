import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { PriceSourceId, SOURCE_LABELS } from '../interfaces/price-reading.interface';
import { ConfigurationException, PriceSourceException } from '../exceptions';
import { MONITOR_DEFAULTS } from '../config/monitor.defaults';
import { isRecord } from '../utils/guards';
import { BaseHttpPriceSource, SourceRequest } from './base.source';

/**
 * Source A: Alpha Vantage GLOBAL_QUOTE endpoint.
 *
 * Quirks:
 * - The price arrives as a string under "Global Quote" / "05. price"
 * - Throttled requests answer 200 with a "Note" or "Information" field
 */
@Injectable()
export class AlphaVantageSource extends BaseHttpPriceSource {
  readonly id = PriceSourceId.ALPHA_VANTAGE;
  readonly name = SOURCE_LABELS[PriceSourceId.ALPHA_VANTAGE];

  private static readonly BASE_URL = 'https://www.alphavantage.co/query';
  private readonly apiKey: string;

  constructor(httpService: HttpService, configService: ConfigService) {
    super(
      httpService,
      configService.get<number>('SOURCE_TIMEOUT_MS', MONITOR_DEFAULTS.SOURCE_TIMEOUT_MS),
    );

    const apiKey = configService.get<string>('ALPHA_VANTAGE_API_KEY');
    if (!apiKey) {
      throw new ConfigurationException('Alpha Vantage API key not found in configuration', [
        'ALPHA_VANTAGE_API_KEY',
      ]);
    }
    this.apiKey = apiKey;
  }

  protected buildRequest(symbol: string): SourceRequest {
    return {
      url: AlphaVantageSource.BASE_URL,
      params: {
        function: 'GLOBAL_QUOTE',
        symbol,
        apikey: this.apiKey,
      },
    };
  }

  protected extractPrice(data: unknown, symbol: string): unknown {
    if (!isRecord(data)) {
      throw new PriceSourceException(this.name, symbol, 'Empty response');
    }

    const throttled = data['Note'] ?? data['Information'];
    if (typeof throttled === 'string') {
      throw new PriceSourceException(this.name, symbol, `Request throttled: ${throttled}`);
    }

    const quote = data['Global Quote'];
    if (!isRecord(quote) || quote['05. price'] === undefined) {
      throw new PriceSourceException(
        this.name,
        symbol,
        `Invalid response: ${JSON.stringify(data)}`,
      );
    }

    return quote['05. price'];
  }
}
