import { IsoDate } from '../common/utils/date.util';

export interface PriceBar {
  date: IsoDate;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export function closeOnlyBar(date: IsoDate, close: number): PriceBar {
  return { date, open: close, high: close, low: close, close, volume: 0 };
}

/**
 * Immutable snapshot of daily bars per symbol.
 * Bars are kept sorted by date; a later bar for the same date replaces an earlier one.
 * Lookups never throw: unknown symbols and dates before the first bar return undefined.
 */
export class PriceSeries {
  private readonly series: ReadonlyMap<string, readonly PriceBar[]>;

  constructor(bars: Record<string, readonly PriceBar[]> = {}) {
    const series = new Map<string, readonly PriceBar[]>();
    for (const [symbol, symbolBars] of Object.entries(bars)) {
      const byDate = new Map<IsoDate, PriceBar>();
      symbolBars.forEach((bar) => byDate.set(bar.date, { ...bar }));
      const sorted = [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
      if (sorted.length > 0) {
        series.set(symbol, sorted);
      }
    }
    this.series = series;
  }

  static empty(): PriceSeries {
    return new PriceSeries();
  }

  symbols(): string[] {
    return [...this.series.keys()].sort();
  }

  has(symbol: string): boolean {
    return this.series.has(symbol);
  }

  bars(symbol: string): readonly PriceBar[] {
    return this.series.get(symbol) ?? [];
  }

  /** Closing prices in date order, optionally limited to `[from, to]`. */
  closes(symbol: string, from?: IsoDate, to?: IsoDate): number[] {
    return this.bars(symbol)
      .filter((bar) => (from === undefined || bar.date >= from) && (to === undefined || bar.date <= to))
      .map((bar) => bar.close);
  }

  /** Latest bar dated on or before `date`. */
  barAsOf(symbol: string, date: IsoDate): PriceBar | undefined {
    const bars = this.bars(symbol);
    let low = 0;
    let high = bars.length - 1;
    let found: PriceBar | undefined;

    while (low <= high) {
      const mid = (low + high) >> 1;
      if (bars[mid].date <= date) {
        found = bars[mid];
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }
    return found;
  }

  /** Last known close on or before `date` (forward-fill). */
  asof(symbol: string, date: IsoDate): number | undefined {
    return this.barAsOf(symbol, date)?.close;
  }

  /** Last close in the series. */
  latest(symbol: string): number | undefined {
    const bars = this.bars(symbol);
    return bars.length > 0 ? bars[bars.length - 1].close : undefined;
  }

  /** True when any symbol has a bar on or before `date`. */
  hasDataAtOrBefore(date: IsoDate): boolean {
    for (const symbol of this.series.keys()) {
      if (this.barAsOf(symbol, date) !== undefined) {
        return true;
      }
    }
    return false;
  }

  /**
   * Copy restricted to the given symbols and `[from, to]`. Each symbol also keeps
   * its last bar on or before `from`, so `asof` can forward-fill into the range.
   */
  window(symbols: readonly string[], from: IsoDate, to: IsoDate): PriceSeries {
    const bars: Record<string, PriceBar[]> = {};
    for (const symbol of symbols) {
      const start = this.barAsOf(symbol, from)?.date ?? from;
      const inRange = this.bars(symbol).filter((bar) => bar.date >= start && bar.date <= to);
      if (inRange.length > 0) {
        bars[symbol] = [...inRange];
      }
    }
    return new PriceSeries(bars);
  }

  /** Copy with one symbol's bars replaced. */
  withBars(symbol: string, bars: readonly PriceBar[]): PriceSeries {
    const all: Record<string, readonly PriceBar[]> = {};
    this.series.forEach((symbolBars, key) => {
      all[key] = symbolBars;
    });
    all[symbol] = bars;
    return new PriceSeries(all);
  }
}
