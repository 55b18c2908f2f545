import { Injectable } from '@nestjs/common';
import { clamp } from '../common/utils/stats.util';
import { bandPoints, matchBand, SCORING_TABLES, ScoringTables } from './score-bands';
import { portfolioInsights } from './portfolio-insights';
import { ADJUSTMENT_GROUPS, AdjustmentGroup, INITIAL_CLASSIFICATION, InitialClassification } from './signal-rules';
import {
  BaseAction,
  ConfidenceLevel,
  GradeInputs,
  InvestmentSignal,
  PerformanceGrade,
  PositionRecommendation,
  RiskScore,
  RiskScoreInputs,
  SignalAction,
  SignalAuditEntry,
  SignalInputs,
  SignalStrength,
} from './entities/scoring.entity';
import { InsightInput, PortfolioInsights } from './entities/portfolio-insights.entity';

/**
 * Pure scorers over computed metrics: risk score, letter grade, position size
 * and investment signal. Thresholds come from scoring-tables.json.
 */
@Injectable()
export class ScoringService {
  private readonly tables: ScoringTables = SCORING_TABLES;
  private readonly initial: readonly InitialClassification[] = INITIAL_CLASSIFICATION;
  private readonly adjustments: readonly AdjustmentGroup[] = ADJUSTMENT_GROUPS;

  /** Base 50 plus signed band points per metric, clamped to [0, 100]. */
  riskScore(inputs: RiskScoreInputs): RiskScore {
    const { base, min, max, components, categories } = this.tables.riskScore;
    const componentScores = {
      volatility: bandPoints(components.volatility, inputs.volatility),
      sharpeRatio: bandPoints(components.sharpeRatio, inputs.sharpeRatio),
      maxDrawdown: bandPoints(components.maxDrawdown, inputs.maxDrawdown),
      sortinoRatio: bandPoints(components.sortinoRatio, inputs.sortinoRatio ?? 0),
      beta: bandPoints(components.beta, inputs.beta ?? 1),
      momentum6m: bandPoints(components.momentum6m, inputs.momentum6m ?? 0),
      annualReturn: bandPoints(components.annualReturn, inputs.annualReturn),
    };
    const total = Object.values(componentScores).reduce((sum, points) => sum + points, base);
    const riskScore = Math.trunc(clamp(total, min, max));
    const category = matchBand(categories, riskScore);

    return {
      riskScore,
      riskCategory: category.category,
      riskDescription: category.description,
      componentScores,
    };
  }

  /** Weighted point buckets (return 35, Sharpe 25, volatility 20, drawdown 10, Sortino 10) mapped to a letter. */
  grade(inputs: GradeInputs): PerformanceGrade {
    const { components, cutoffs } = this.tables.grade;
    const returnPoints = bandPoints(components.annualReturn, inputs.annualReturn);
    const sharpePoints = bandPoints(components.sharpeRatio, inputs.sharpeRatio);
    const volatilityPoints = bandPoints(components.volatility, inputs.volatility);
    const drawdownPoints = bandPoints(components.maxDrawdown, inputs.maxDrawdown ?? 0);
    const sortinoPoints = bandPoints(components.sortinoRatio, inputs.sortinoRatio ?? 0);
    const totalScore = returnPoints + sharpePoints + volatilityPoints + drawdownPoints + sortinoPoints;
    const cutoff = matchBand(cutoffs, totalScore);

    const riskScore = inputs.riskScore ?? 50;
    const riskQuality = riskScore >= 70 ? 'Low' : riskScore >= 50 ? 'Moderate' : 'High';
    const returnQuality =
      inputs.annualReturn > 20 ? 'Excellent' : inputs.annualReturn > 10 ? 'Good' : inputs.annualReturn > 0 ? 'Fair' : 'Poor';

    return {
      grade: cutoff.grade,
      gradePoints: cutoff.gradePoints,
      description: cutoff.description,
      investmentTier: cutoff.tier,
      recommendation: cutoff.recommendation,
      scoreBreakdown: { totalScore, returnPoints, sharpePoints, volatilityPoints, drawdownPoints, sortinoPoints },
      qualitativeAssessment: {
        riskQuality,
        returnQuality,
        overallAssessment: `${returnQuality} returns with ${riskQuality.toLowerCase()} risk`,
      },
    };
  }

  positionRecommendation(riskScore: number, performance: number): PositionRecommendation {
    const rules = this.tables.positionSize;
    const rule =
      rules.find(
        (candidate) =>
          riskScore >= candidate.minRiskScore &&
          (candidate.performanceAbove === undefined || performance > candidate.performanceAbove),
      ) ?? rules[rules.length - 1];

    return {
      size: rule.size,
      percentageOfPortfolio: rule.percentageOfPortfolio,
      rationale: rule.rationale,
    };
  }

  /**
   * Classifies performance into a base action, then runs each adjustment group
   * in order. Every fired rule is recorded in the audit trail with its
   * confidence delta and the action before and after it.
   */
  investmentSignal(inputs: SignalInputs): InvestmentSignal {
    const initial = this.initial.find((candidate) => candidate.when(inputs)) ?? this.initial[this.initial.length - 1];
    const audit: SignalAuditEntry[] = [
      {
        rule: initial.rule,
        reason: initial.reason,
        confidenceDelta: initial.confidence,
        actionBefore: null,
        actionAfter: initial.action,
      },
    ];

    let action: BaseAction = initial.action;
    for (const group of this.adjustments) {
      const fired = group.rules.find((rule) => rule.when(inputs));
      if (!fired) {
        continue;
      }
      const next = fired.adjust ? fired.adjust(action, inputs) : action;
      audit.push({
        rule: fired.rule,
        reason: fired.reason,
        confidenceDelta: fired.confidence,
        actionBefore: action,
        actionAfter: next,
      });
      action = next;
    }

    const confidenceScore = audit.reduce((sum, entry) => sum + entry.confidenceDelta, 0);
    const finalAction: SignalAction = action === 'MONITOR' ? 'MONITOR_CLOSELY' : action;

    return {
      action: finalAction,
      baseAction: initial.action,
      strength: signalStrength(finalAction, confidenceScore),
      reasoning: audit.map((entry) => entry.reason).join('; '),
      confidence: confidenceLevel(confidenceScore),
      confidenceScore,
      audit,
    };
  }

  portfolioInsights(inputs: readonly InsightInput[]): PortfolioInsights | null {
    return portfolioInsights(inputs, this.tables.portfolioGrade);
  }
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 60) return 'VERY_HIGH';
  if (score >= 40) return 'HIGH';
  if (score >= 20) return 'MEDIUM';
  if (score >= 0) return 'LOW';
  return 'VERY_LOW';
}

export function signalStrength(action: SignalAction, confidenceScore: number): SignalStrength {
  if (confidenceScore >= 50 && (action === 'STRONG_BUY' || action === 'BUY_MORE')) return 'STRONG_POSITIVE';
  if (confidenceScore >= 30 && (action === 'BUY_MORE' || action === 'BUY_SMALL')) return 'POSITIVE';
  if (action === 'REDUCE_POSITION' || action === 'CONSIDER_SELL') return 'NEGATIVE';
  return 'NEUTRAL';
}
