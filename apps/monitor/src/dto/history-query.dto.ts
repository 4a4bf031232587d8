import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

/** Ticker symbols: letters, digits, dot, dash and a leading caret for indices */
export const SYMBOL_PATTERN = /^\^?[A-Za-z0-9.-]{1,15}$/;

export class SymbolParamDto {
  @IsString()
  @Matches(SYMBOL_PATTERN, { message: 'symbol must be a ticker symbol' })
  symbol!: string;
}

export class HistoryQueryDto {
  @IsOptional()
  @IsString()
  @Matches(SYMBOL_PATTERN, { message: 'symbol must be a ticker symbol' })
  symbol?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}
