import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, timeout, TimeoutError } from 'rxjs';
import { PriceSource } from '../interfaces/price-source.interface';
import { PriceReading, PriceSourceId } from '../interfaces/price-reading.interface';
import { PriceSourceException } from '../exceptions';

export interface SourceRequest {
  url: string;
  params?: Record<string, string>;
}

/**
 * Abstract base for HTTP price providers.
 *
 * Every call is bounded by `timeoutMs` and any failure surfaces as
 * PriceSourceException. The returned price is left raw for PriceValidator.
 */
export abstract class BaseHttpPriceSource implements PriceSource {
  protected readonly logger: Logger;

  abstract readonly id: PriceSourceId;
  abstract readonly name: string;

  constructor(
    protected readonly httpService: HttpService,
    protected readonly timeoutMs: number,
  ) {
    this.logger = new Logger(this.constructor.name);
  }

  /**
   * Provider-specific request for the current quote
   */
  protected abstract buildRequest(symbol: string): SourceRequest;

  /**
   * Pull the raw price out of the response body.
   * @throws PriceSourceException when the payload carries no price
   */
  protected abstract extractPrice(data: unknown, symbol: string): unknown;

  async fetch(symbol: string): Promise<PriceReading> {
    const request = this.buildRequest(symbol);
    const startTime = Date.now();

    try {
      const response = await firstValueFrom(
        this.httpService
          .get<unknown>(request.url, {
            params: request.params,
            timeout: this.timeoutMs,
          })
          .pipe(timeout(this.timeoutMs)),
      );
      const price = this.extractPrice(response.data, symbol);

      this.logger.debug(
        `${this.name} answered for ${symbol} in ${Date.now() - startTime}ms`,
      );

      return {
        symbol,
        source: this.id,
        price,
        observedAt: Date.now(),
      };
    } catch (err) {
      if (err instanceof PriceSourceException) {
        throw err;
      }
      if (err instanceof TimeoutError) {
        throw new PriceSourceException(
          this.name,
          symbol,
          `timed out after ${this.timeoutMs}ms`,
          err,
        );
      }
      const cause = err instanceof Error ? err : undefined;
      throw new PriceSourceException(
        this.name,
        symbol,
        cause ? cause.message : String(err),
        cause,
      );
    }
  }
}
