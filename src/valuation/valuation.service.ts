import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { Ledger, orderLedger } from '../ledger/entities/transaction.entity';
import { PriceSeries } from '../market-data/price-series';
import { eachDay, IsoDate } from '../common/utils/date.util';
import { round } from '../common/utils/stats.util';
import { toDecimal, toNumber, ZERO } from '../common/utils/decimal.util';
import { PositionValuation, SymbolPerformancePoint, ValuationPoint } from './entities/valuation-point.entity';

export interface TimelineOptions {
  /** Series in `prices` giving base-currency units per quote-currency unit. */
  fxSymbol?: string;
}

// Daily portfolio valuation walk. Restartable: same inputs, same points.
@Injectable()
export class ValuationService {
  constructor(private readonly replay: LedgerReplayService) {}

  /**
   * One point per calendar day in `[start, end]`.
   * Holdings start from every transaction dated before `start`; each day applies
   * that day's transactions, then prices held symbols at their latest close on or
   * before the day. Days before any price data exist are skipped.
   */
  portfolioTimeline(
    ledger: Ledger,
    prices: PriceSeries,
    start: IsoDate,
    end: IsoDate,
    options: TimelineOptions = {},
  ): ValuationPoint[] {
    const ordered = orderLedger(ledger);
    const state = this.replay.emptyState();
    let cursor = 0;

    while (cursor < ordered.length && ordered[cursor].date < start) {
      this.replay.apply(state, ordered[cursor++]);
    }

    const points: ValuationPoint[] = [];
    for (const day of eachDay(start, end)) {
      while (cursor < ordered.length && ordered[cursor].date === day) {
        this.replay.apply(state, ordered[cursor++]);
      }

      if (!prices.hasDataAtOrBefore(day)) {
        continue;
      }

      const breakdown: Record<string, PositionValuation> = {};
      let total = ZERO;
      const symbols = [...state.holdings.keys()].sort();
      for (const symbol of symbols) {
        const quantity = state.holdings.get(symbol) ?? ZERO;
        if (quantity.lessThanOrEqualTo(0)) {
          continue;
        }
        const price = prices.asof(symbol, day);
        if (price === undefined) {
          continue;
        }
        const value = quantity.times(price).toDecimalPlaces(8);
        total = total.plus(value);
        breakdown[symbol] = {
          quantity: toNumber(quantity),
          price,
          value: value.toNumber(),
        };
      }

      const fxRate = options.fxSymbol ? prices.asof(options.fxSymbol, day) : undefined;
      points.push({
        date: day,
        value: total.toNumber(),
        convertedValue: this.convert(total, fxRate),
        fxRate: fxRate ?? null,
        cash: toNumber(state.cash),
        breakdown,
      });
    }

    return points;
  }

  /**
   * Day-over-day return and performance versus `averageCost` for each bar of
   * `symbol` in `[start, end]`, rounded to 6 decimals. The first bar's daily return is 0.
   */
  symbolPerformance(
    prices: PriceSeries,
    symbol: string,
    averageCost: number,
    start?: IsoDate,
    end?: IsoDate,
  ): SymbolPerformancePoint[] {
    let previous: number | undefined;
    return prices
      .bars(symbol)
      .filter((bar) => (start === undefined || bar.date >= start) && (end === undefined || bar.date <= end))
      .map((bar) => {
        const dailyReturn = previous !== undefined && previous > 0 ? (bar.close - previous) / previous : 0;
        const cumulative = averageCost > 0 ? (bar.close - averageCost) / averageCost : 0;
        previous = bar.close;
        return {
          date: bar.date,
          close: bar.close,
          dailyReturn: round(dailyReturn, 6),
          cumulativePerformance: round(cumulative, 6),
        };
      });
  }

  private convert(value: Decimal, rate: number | undefined): number {
    if (rate === undefined || !(rate > 0)) {
      return 0;
    }
    return toNumber(value.dividedBy(toDecimal(rate)));
  }
}
