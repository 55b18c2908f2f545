import { IsoDate } from '../../common/utils/date.util';

export interface PositionValuation {
  quantity: number;
  price: number;        // asof close
  value: number;        // quantity × price
}

// Portfolio value on one calendar day. `value` covers securities only.
export interface ValuationPoint {
  date: IsoDate;
  value: number;                                  // base currency
  convertedValue: number;                         // quote currency, 0 without an FX rate
  fxRate: number | null;
  cash: number;
  breakdown: Record<string, PositionValuation>;
}

// Per-trading-day performance of one symbol against the investor's average cost.
export interface SymbolPerformancePoint {
  date: IsoDate;
  close: number;
  dailyReturn: number;
  cumulativePerformance: number;
}

export interface SymbolPerformance {
  symbol: string;
  averageCost: number;
  points: SymbolPerformancePoint[];
}
