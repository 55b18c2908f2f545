import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { engineConfig } from '../config/engine.config';
import { analysisError, AnalysisResult } from '../common/interfaces/analysis-result.interface';
import { percentile, stddev } from '../common/utils/stats.util';
import { annualizeReturns } from './return-series';
import { RiskProfile } from './entities/risk-profile.entity';

export const TRADING_DAYS_PER_YEAR = 252;

export interface RiskMetricsOptions {
  /** Annual return in percent, normally CAGR since purchase. Defaults to the series' own annualization. */
  annualizedReturn?: number;
  minSamples?: number;
}

@Injectable()
export class RiskMetricsService {
  constructor(@Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>) {}

  /**
   * Volatility, Sharpe, drawdown and VaR of a daily fractional return series.
   * Fewer returns than the minimum sample size yield an insufficient_data result.
   */
  riskMetrics(returns: readonly number[], options: RiskMetricsOptions = {}): AnalysisResult<RiskProfile> {
    const minSamples = options.minSamples ?? this.config.riskMinSamples;
    if (returns.length < minSamples) {
      return analysisError(
        'insufficient_data',
        `Insufficient data: ${returns.length} returns, at least ${minSamples} required`,
      );
    }

    const volatility = this.volatility(returns);
    const annualizedReturn = options.annualizedReturn ?? annualizeReturns(returns, TRADING_DAYS_PER_YEAR);

    return {
      volatility,
      annualizedReturn,
      sharpeRatio: this.sharpeRatio(annualizedReturn, volatility),
      maxDrawdown: this.maxDrawdown(returns),
      var95: this.valueAtRisk(returns),
      sampleSize: returns.length,
    };
  }

  /** Annualized population stddev in percent. */
  volatility(returns: readonly number[]): number {
    return stddev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
  }

  sharpeRatio(annualizedReturn: number, volatility: number): number {
    return volatility > 0 ? annualizedReturn / volatility : 0;
  }

  /**
   * Worst peak-to-trough decline of the wealth index in percent.
   * The index starts from 1.0 and the peak is tracked over the compounded values.
   */
  maxDrawdown(returns: readonly number[]): number {
    let wealth = 1.0;
    let peak = -Infinity;
    let worst = 0;

    for (const r of returns) {
      wealth *= 1 + r;
      peak = Math.max(peak, wealth);
      if (peak > 0) {
        worst = Math.min(worst, (wealth / peak - 1) * 100);
      }
    }
    return worst;
  }

  /** 5th percentile of daily returns in percent. */
  valueAtRisk(returns: readonly number[], tail = 0.05): number {
    return percentile(
      returns.map((r) => r * 100),
      tail,
    );
  }
}
