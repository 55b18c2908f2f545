import { registerAs } from '@nestjs/config';
import { EnvironmentVariables, validateEnv } from './env.validation';

export interface EngineConfig {
  port: number;
  baseCurrency: string;
  quoteCurrency: string;
  fxSymbol: string;
  dashboardCacheTtlMs: number;
  sectorLookupConcurrency: number;
  riskMinSamples: number;
  riskLookbackDays: number;
}

export function toEngineConfig(env: EnvironmentVariables): EngineConfig {
  return {
    port: env.PORT,
    baseCurrency: env.BASE_CURRENCY,
    quoteCurrency: env.QUOTE_CURRENCY,
    fxSymbol: env.FX_SYMBOL,
    dashboardCacheTtlMs: env.DASHBOARD_CACHE_TTL_SECONDS * 1000,
    sectorLookupConcurrency: env.SECTOR_LOOKUP_CONCURRENCY,
    riskMinSamples: env.RISK_MIN_SAMPLES,
    riskLookbackDays: env.RISK_LOOKBACK_DAYS,
  };
}

/** Defaults with no environment overrides - handy for tests. */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = toEngineConfig(validateEnv({}));

export const engineConfig = registerAs('engine', (): EngineConfig => toEngineConfig(validateEnv(process.env)));
