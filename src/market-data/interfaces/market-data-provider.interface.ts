import { IsoDate } from '../../common/utils/date.util';
import { PriceSeries } from '../price-series';

export const PRICE_SERIES_PROVIDER = Symbol('PRICE_SERIES_PROVIDER');
export const FX_RATE_PROVIDER = Symbol('FX_RATE_PROVIDER');
export const SECTOR_INFO_PROVIDER = Symbol('SECTOR_INFO_PROVIDER');

/**
 * Daily price history source.
 * Symbols without data are simply absent from the returned series; never throws for them.
 */
export interface PriceSeriesProvider {
  getPrices(symbols: readonly string[], start: IsoDate, end: IsoDate): Promise<PriceSeries>;
}

export interface FxRateProvider {
  /** Units of `base` per one unit of `quote`, undefined when unknown. */
  latestRate(base: string, quote: string): Promise<number | undefined>;
}

export interface SectorInfo {
  sector: string;
  industry: string;
}

export interface SectorInfoProvider {
  /** May reject; callers fall back to an Unknown sector. */
  lookup(symbol: string): Promise<SectorInfo>;
}
