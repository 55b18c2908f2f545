/**
 * Market path: day-over-day fractional change. n closes → n - 1 returns.
 * Non-positive previous closes produce no return.
 */
export function marketReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] > 0) {
      returns.push((closes[i] - closes[i - 1]) / closes[i - 1]);
    }
  }
  return returns;
}

/**
 * Investor path: the first return is measured from the investor's average cost,
 * then day-over-day. n closes → n returns when the cost is positive.
 */
export function userRelativeReturns(closes: readonly number[], averageCost: number): number[] {
  const returns: number[] = [];
  let previous = averageCost;
  for (const close of closes) {
    if (previous > 0) {
      returns.push((close - previous) / previous);
    }
    previous = close;
  }
  return returns;
}

/**
 * CAGR in percent: ((currentValue / costBasis) ^ (365 / daysHeld) - 1) × 100.
 * Zero when cost basis, value or holding period is non-positive, or when the power is not finite.
 */
export function cagr(costBasis: number, currentValue: number, daysHeld: number): number {
  if (!(costBasis > 0) || !(currentValue > 0) || !(daysHeld > 0)) {
    return 0;
  }
  const annualized = ((currentValue / costBasis) ** (365 / daysHeld) - 1) * 100;
  return Number.isFinite(annualized) ? annualized : 0;
}

/** Geometric annualization of a daily return series over `periodsPerYear`, in percent. */
export function annualizeReturns(returns: readonly number[], periodsPerYear = 252): number {
  if (returns.length === 0) {
    return 0;
  }
  const growth = returns.reduce((product, r) => product * (1 + r), 1);
  const annualized = (growth ** (periodsPerYear / returns.length) - 1) * 100;
  return Number.isFinite(annualized) ? annualized : 0;
}
