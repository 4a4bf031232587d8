import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationException } from '../exceptions';
import { MONITOR_DEFAULTS } from './monitor.defaults';

/**
 * Environment schema, validated once at bootstrap
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  ALPHA_VANTAGE_API_KEY!: string;

  @IsString()
  @IsNotEmpty()
  EMAIL_SENDER!: string;

  @IsString()
  @IsNotEmpty()
  EMAIL_PASSWORD!: string;

  @IsString()
  @IsNotEmpty()
  EMAIL_RECIPIENTS!: string;

  @IsString()
  @IsNotEmpty()
  SMTP_HOST: string = MONITOR_DEFAULTS.SMTP_HOST;

  @IsInt()
  @Min(1)
  @Max(65535)
  SMTP_PORT: number = MONITOR_DEFAULTS.SMTP_PORT;

  @IsNumber()
  @Min(0)
  DISCREPANCY_THRESHOLD: number = MONITOR_DEFAULTS.DISCREPANCY_THRESHOLD;

  @IsInt()
  @Min(0)
  ALERT_COOLDOWN_MS: number = MONITOR_DEFAULTS.ALERT_COOLDOWN_MS;

  @IsInt()
  @Min(1)
  MAX_ALERTS_PER_HOUR: number = MONITOR_DEFAULTS.MAX_ALERTS_PER_HOUR;

  @IsInt()
  @Min(0)
  FETCH_CACHE_MS: number = MONITOR_DEFAULTS.FETCH_CACHE_MS;

  @IsInt()
  @IsPositive()
  MAX_HISTORY_RECORDS: number = MONITOR_DEFAULTS.MAX_HISTORY_RECORDS;

  @IsInt()
  @IsPositive()
  MOVING_AVERAGE_WINDOW: number = MONITOR_DEFAULTS.MOVING_AVERAGE_WINDOW;

  @IsInt()
  @IsPositive()
  CROSS_VALIDATION_WINDOW: number = MONITOR_DEFAULTS.CROSS_VALIDATION_WINDOW;

  @IsNumber()
  @Min(0)
  LARGE_SPREAD_THRESHOLD: number = MONITOR_DEFAULTS.LARGE_SPREAD_THRESHOLD;

  @IsNumber()
  @Min(0)
  SOURCE_DEVIATION_THRESHOLD: number = MONITOR_DEFAULTS.SOURCE_DEVIATION_THRESHOLD;

  @IsInt()
  @IsPositive()
  SOURCE_TIMEOUT_MS: number = MONITOR_DEFAULTS.SOURCE_TIMEOUT_MS;

  @IsInt()
  @IsPositive()
  SOURCE_FAILURE_TOLERANCE: number = MONITOR_DEFAULTS.SOURCE_FAILURE_TOLERANCE;

  @IsString()
  @IsNotEmpty()
  STOCK_SYMBOLS: string = MONITOR_DEFAULTS.STOCK_SYMBOLS;

  @IsInt()
  @Min(1000)
  POLL_INTERVAL_MS: number = MONITOR_DEFAULTS.POLL_INTERVAL_MS;

  @Transform(({ obj }: { obj: Record<string, unknown> }) =>
    String(obj['SCHEDULER_ENABLED']).trim().toLowerCase() !== 'false',
  )
  @IsBoolean()
  SCHEDULER_ENABLED: boolean = true;

  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = MONITOR_DEFAULTS.PORT;
}

/**
 * ConfigModule `validate` hook. Converts numeric strings and rejects
 * missing credentials or out-of-range thresholds.
 *
 * @throws ConfigurationException listing every invalid key
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const keys = errors.map(e => e.property);
    const details = errors
      .map(e => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new ConfigurationException(`Invalid configuration: ${details}`, keys);
  }

  return validated;
}
