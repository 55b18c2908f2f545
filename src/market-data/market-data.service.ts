import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock/clock';
import { IsoDate, toIsoDate } from '../common/utils/date.util';
import { closeOnlyBar, PriceBar, PriceSeries } from './price-series';
import { FxRateProvider, PriceSeriesProvider } from './interfaces/market-data-provider.interface';

/**
 * In-memory market data store.
 * Manual updates via REST API - no live feeds.
 * A vendor client implementing PriceSeriesProvider / FxRateProvider replaces it in production.
 */
@Injectable()
export class MarketDataService implements PriceSeriesProvider, FxRateProvider {
  private readonly logger = new Logger(MarketDataService.name);
  private series: PriceSeries = PriceSeries.empty();
  private lastPriceUpdate: Date;

  constructor(@Inject(CLOCK) private readonly clock: Clock) {
    this.lastPriceUpdate = clock.now();
  }

  /** Bars within `[start, end]` plus each symbol's last bar before `start` for forward-fill. */
  async getPrices(symbols: readonly string[], start: IsoDate, end: IsoDate): Promise<PriceSeries> {
    const result = this.series.window(symbols, start, end);
    const missing = symbols.filter((symbol) => !result.has(symbol));
    if (missing.length > 0) {
      this.logger.warn(`No price data for ${missing.join(', ')} between ${start} and ${end}`);
    }
    return result;
  }

  /** FX pairs are stored as `${quote}${base}=X`, e.g. EURTRY=X. */
  async latestRate(base: string, quote: string): Promise<number | undefined> {
    return this.series.latest(fxSymbol(base, quote));
  }

  /** Latest close per symbol - omits symbols without data */
  getLatestPrices(symbols?: readonly string[]): Record<string, number> {
    const prices: Record<string, number> = {};
    for (const symbol of symbols ?? this.series.symbols()) {
      const price = this.series.latest(symbol);
      if (price !== undefined) {
        prices[symbol] = price;
      }
    }
    return prices;
  }

  /**
   * Records a close for one symbol on `date` (default: today).
   * @throws Error if price <= 0
   */
  updatePrice(symbol: string, price: number, date?: IsoDate): void {
    assertPositive(symbol, price);
    this.recordBars(symbol, [closeOnlyBar(date ?? toIsoDate(this.clock.now()), price)]);
  }

  /**
   * Batch price updates - validates all before applying.
   * @throws Error on first invalid price
   */
  updatePrices(prices: Record<string, number>, date?: IsoDate): void {
    Object.entries(prices).forEach(([symbol, price]) => assertPositive(symbol, price));
    Object.entries(prices).forEach(([symbol, price]) => this.updatePrice(symbol, price, date));
  }

  /** Merges bars into a symbol's history; bars on existing dates replace them. */
  recordBars(symbol: string, bars: readonly PriceBar[]): void {
    bars.forEach((bar) => assertPositive(symbol, bar.close));
    this.series = this.series.withBars(symbol, [...this.series.bars(symbol), ...bars]);
    this.lastPriceUpdate = this.clock.now();
  }

  getLastUpdateTime(): Date {
    return this.lastPriceUpdate;
  }

  /** Drops all bars - test harness only */
  clearAllPrices(): void {
    this.series = PriceSeries.empty();
    this.lastPriceUpdate = this.clock.now();
  }
}

export function fxSymbol(base: string, quote: string): string {
  return `${quote}${base}=X`;
}

function assertPositive(symbol: string, price: number): void {
  if (!(price > 0)) {
    throw new Error(`Price must be positive, got ${price} for ${symbol}`);
  }
}
