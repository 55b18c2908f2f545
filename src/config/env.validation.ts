import { plainToInstance } from 'class-transformer';
import { IsInt, IsOptional, IsPositive, IsString, Length, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  @Length(3, 3)
  BASE_CURRENCY: string = 'TRY';

  @IsOptional()
  @IsString()
  @Length(3, 3)
  QUOTE_CURRENCY: string = 'EUR';

  // Series holding the price of one QUOTE_CURRENCY unit in BASE_CURRENCY
  @IsOptional()
  @IsString()
  FX_SYMBOL: string = 'EURTRY=X';

  @IsOptional()
  @IsInt()
  @Min(0)
  DASHBOARD_CACHE_TTL_SECONDS: number = 30;

  @IsOptional()
  @IsInt()
  @IsPositive()
  SECTOR_LOOKUP_CONCURRENCY: number = 2;

  @IsOptional()
  @IsInt()
  @Min(2)
  RISK_MIN_SAMPLES: number = 5;

  @IsOptional()
  @IsInt()
  @IsPositive()
  RISK_LOOKBACK_DAYS: number = 365;
}

/** ConfigModule `validate` hook: coerces numeric strings and fails fast on bad values. */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.map((error) => error.toString()).join('\n'));
  }
  return validated;
}
