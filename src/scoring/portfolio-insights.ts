import { round } from '../common/utils/stats.util';
import { PortfolioGradeRule } from './score-bands';
import {
  ExposureLevel,
  InsightInput,
  PortfolioInsights,
  PortfolioStrategy,
} from './entities/portfolio-insights.entity';

export const HIGH_RISK_SCORE = 40;

interface ActionGroups {
  strongBuys: string[];
  buyMore: string[];
  holds: string[];
  considerSells: string[];
}

function groupByAction(inputs: readonly InsightInput[]): ActionGroups {
  const symbolsWhere = (match: (input: InsightInput) => boolean): string[] =>
    inputs.filter(match).map((input) => input.symbol);

  return {
    strongBuys: symbolsWhere((i) => i.action === 'STRONG_BUY'),
    buyMore: symbolsWhere((i) => i.action === 'BUY_MORE'),
    holds: symbolsWhere((i) => i.action === 'HOLD'),
    considerSells: symbolsWhere((i) => i.action === 'CONSIDER_SELL' || i.action === 'REDUCE_POSITION'),
  };
}

export function portfolioGrade(
  rules: readonly PortfolioGradeRule[],
  weightedReturn: number,
  weightedVolatility: number,
  averageSharpe: number,
): { grade: string; description: string } {
  const rule =
    rules.find(
      (candidate) =>
        (candidate.returnAbove === undefined || weightedReturn > candidate.returnAbove) &&
        (candidate.volatilityBelow === undefined || weightedVolatility < candidate.volatilityBelow) &&
        (candidate.sharpeAbove === undefined || averageSharpe > candidate.sharpeAbove),
    ) ?? rules[rules.length - 1];
  return { grade: rule.grade, description: rule.description };
}

// Checked in order; shares are of the symbols that landed in an action group.
export function portfolioStrategy(
  groups: ActionGroups,
  weightedReturn: number,
  weightedVolatility: number,
): { strategy: PortfolioStrategy; description: string } {
  const total =
    groups.strongBuys.length + groups.buyMore.length + groups.holds.length + groups.considerSells.length;

  if (groups.strongBuys.length > 0 && weightedReturn > 10) {
    return {
      strategy: 'AGGRESSIVE_GROWTH',
      description: `Focus on ${groups.strongBuys.length} strong performers. Consider increasing positions.`,
    };
  }
  if (groups.buyMore.length > total * 0.4) {
    return {
      strategy: 'MODERATE_GROWTH',
      description: `Good opportunity to increase positions in ${groups.buyMore.length} stocks.`,
    };
  }
  if (groups.considerSells.length > total * 0.3) {
    return {
      strategy: 'PORTFOLIO_CLEANUP',
      description: `Consider reducing or selling ${groups.considerSells.length} underperforming stocks.`,
    };
  }
  if (weightedVolatility > 50) {
    return {
      strategy: 'RISK_REDUCTION',
      description: 'High portfolio volatility. Focus on stability and risk management.',
    };
  }
  return { strategy: 'BALANCED_HOLD', description: 'Maintain current positions and monitor performance.' };
}

function exposureLevel(percent: number): ExposureLevel {
  if (percent > 40) return 'HIGH';
  if (percent > 20) return 'MEDIUM';
  return 'LOW';
}

/**
 * Value-weighted aggregate over scored holdings. Returns null for an empty
 * portfolio.
 */
export function portfolioInsights(
  inputs: readonly InsightInput[],
  gradeRules: readonly PortfolioGradeRule[],
): PortfolioInsights | null {
  if (inputs.length === 0) {
    return null;
  }

  const totalValue = inputs.reduce((sum, i) => sum + i.currentValue, 0);
  const weighted = (pick: (input: InsightInput) => number): number =>
    totalValue > 0 ? inputs.reduce((sum, i) => sum + pick(i) * i.currentValue, 0) / totalValue : 0;

  const weightedReturn = weighted((i) => i.annualizedReturn);
  const weightedVolatility = weighted((i) => i.volatility);
  const averageSharpe = inputs.reduce((sum, i) => sum + i.sharpeRatio, 0) / inputs.length;

  const groups = groupByAction(inputs);
  const highRisk = inputs.filter((i) => i.riskScore < HIGH_RISK_SCORE);
  const highRiskValue = highRisk.reduce((sum, i) => sum + i.currentValue, 0);
  const highRiskExposure = totalValue > 0 ? (highRiskValue / totalValue) * 100 : 0;

  return {
    portfolioSummary: {
      totalValue: round(totalValue, 2),
      weightedAnnualReturn: round(weightedReturn, 2),
      weightedVolatility: round(weightedVolatility, 2),
      averageSharpeRatio: round(averageSharpe, 2),
      portfolioGrade: portfolioGrade(gradeRules, weightedReturn, weightedVolatility, averageSharpe),
    },
    actionSummary: {
      ...groups,
      strongBuyCount: groups.strongBuys.length,
      totalStocks: inputs.length,
    },
    riskAnalysis: {
      highRiskStocks: highRisk.map((i) => i.symbol),
      highRiskExposurePercent: round(highRiskExposure, 2),
      riskLevel: exposureLevel(highRiskExposure),
    },
    strategyRecommendation: portfolioStrategy(groups, weightedReturn, weightedVolatility),
  };
}
