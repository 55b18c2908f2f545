// Risk / performance figures, all in percent except the Sharpe ratio.
export interface RiskProfile {
  volatility: number;          // annualized stddev of daily returns
  annualizedReturn: number;
  sharpeRatio: number;         // no risk-free subtraction
  maxDrawdown: number;         // ≤ 0
  var95: number;               // 5th percentile daily return
  sampleSize: number;
}

export type ReturnSource = 'market' | 'user';
