import { BaseAction, SignalInputs } from './entities/scoring.entity';

export interface InitialClassification {
  rule: string;
  when: (inputs: SignalInputs) => boolean;
  action: BaseAction;
  confidence: number;
  reason: string;
}

export interface AdjustmentRule {
  rule: string;
  when: (inputs: SignalInputs) => boolean;
  confidence: number;
  reason: string;
  adjust?: (action: BaseAction, inputs: SignalInputs) => BaseAction;
}

/** Mutually exclusive rules on one factor: the first match fires, the rest are skipped. */
export interface AdjustmentGroup {
  factor: string;
  rules: AdjustmentRule[];
}

const isOneOf =
  (...actions: BaseAction[]) =>
  (action: BaseAction): boolean =>
    actions.includes(action);

const isBuying = isOneOf('STRONG_BUY', 'BUY_MORE');
const isSelling = isOneOf('REDUCE_POSITION', 'CONSIDER_SELL');

// Performance versus cost basis, in percent. Last entry catches everything.
export const INITIAL_CLASSIFICATION: readonly InitialClassification[] = [
  { rule: 'performance.exceptional', when: (i) => i.performance > 30, action: 'STRONG_BUY', confidence: 25, reason: 'Exceptional performance (+30%)' },
  { rule: 'performance.strong', when: (i) => i.performance > 15, action: 'BUY_MORE', confidence: 20, reason: 'Strong performance (+15%)' },
  { rule: 'performance.positive', when: (i) => i.performance > 5, action: 'HOLD', confidence: 10, reason: 'Positive performance (+5%)' },
  { rule: 'performance.minor_loss', when: (i) => i.performance > -10, action: 'MONITOR', confidence: 5, reason: 'Minor losses (-10%)' },
  { rule: 'performance.significant_loss', when: (i) => i.performance > -25, action: 'REDUCE_POSITION', confidence: -10, reason: 'Significant losses (-25%)' },
  { rule: 'performance.major_loss', when: () => true, action: 'CONSIDER_SELL', confidence: -20, reason: 'Major losses (-25%+)' },
];

// Applied in order; each group sees the action left by the groups before it.
export const ADJUSTMENT_GROUPS: readonly AdjustmentGroup[] = [
  {
    factor: 'sharpe',
    rules: [
      {
        rule: 'sharpe.excellent',
        when: (i) => i.sharpeRatio > 1.5,
        confidence: 20,
        reason: 'Excellent risk-adjusted returns (Sharpe > 1.5)',
        adjust: (a) => (isOneOf('HOLD', 'MONITOR')(a) ? 'BUY_MORE' : a),
      },
      { rule: 'sharpe.good', when: (i) => i.sharpeRatio > 1.0, confidence: 15, reason: 'Good risk-adjusted returns (Sharpe > 1.0)' },
      { rule: 'sharpe.fair', when: (i) => i.sharpeRatio > 0.5, confidence: 5, reason: 'Fair risk-adjusted returns' },
      {
        rule: 'sharpe.negative',
        when: (i) => i.sharpeRatio < 0,
        confidence: -15,
        reason: 'Poor risk-adjusted returns',
        adjust: (a) => (a === 'BUY_MORE' ? 'HOLD' : a === 'HOLD' ? 'MONITOR' : a),
      },
    ],
  },
  {
    factor: 'volatility',
    rules: [
      {
        rule: 'volatility.very_high',
        when: (i) => i.volatility > 60,
        confidence: -15,
        reason: 'Very high volatility (>60%)',
        adjust: (a) => (isBuying(a) ? 'BUY_SMALL' : a),
      },
      {
        rule: 'volatility.high',
        when: (i) => i.volatility > 40,
        confidence: -10,
        reason: 'High volatility (>40%)',
        adjust: (a) => (a === 'STRONG_BUY' ? 'BUY_MORE' : a),
      },
      {
        rule: 'volatility.low',
        when: (i) => i.volatility < 25,
        confidence: 10,
        reason: 'Low volatility (<25%)',
        adjust: (a, i) => (a === 'HOLD' && i.performance > 0 ? 'BUY_MORE' : a),
      },
    ],
  },
  {
    factor: 'drawdown',
    rules: [
      {
        rule: 'drawdown.severe',
        when: (i) => i.maxDrawdown < -40,
        confidence: -20,
        reason: 'Severe historical drawdowns (-40%+)',
        adjust: (a) => (isBuying(a) ? 'BUY_SMALL' : a),
      },
      { rule: 'drawdown.large', when: (i) => i.maxDrawdown < -25, confidence: -10, reason: 'Large historical drawdowns (-25%)' },
      { rule: 'drawdown.minimal', when: (i) => i.maxDrawdown > -10, confidence: 15, reason: 'Minimal historical drawdowns' },
    ],
  },
  {
    factor: 'holding_period',
    rules: [
      { rule: 'holding.recent', when: (i) => i.daysHeld < 90, confidence: 5, reason: 'Recently acquired (< 3 months)' },
      {
        rule: 'holding.long_term_underperforming',
        when: (i) => i.daysHeld > 730 && i.performance < -15,
        confidence: -10,
        reason: 'Long-term holding (2+ years); Long-term underperformance suggests reconsideration',
      },
      { rule: 'holding.long_term', when: (i) => i.daysHeld > 730, confidence: 5, reason: 'Long-term holding (2+ years)' },
    ],
  },
  {
    factor: 'risk_score',
    rules: [
      {
        rule: 'risk.very_low',
        when: (i) => i.riskScore >= 80,
        confidence: 15,
        reason: 'Very low risk profile',
        adjust: (a) => (a === 'MONITOR' ? 'HOLD' : a),
      },
      { rule: 'risk.low', when: (i) => i.riskScore >= 65, confidence: 10, reason: 'Low risk profile' },
      {
        rule: 'risk.high',
        when: (i) => i.riskScore < 40,
        confidence: -15,
        reason: 'High risk profile',
        adjust: (a) => (isBuying(a) ? 'BUY_SMALL' : a),
      },
    ],
  },
  {
    factor: 'grade',
    rules: [
      {
        rule: 'grade.a',
        when: (i) => i.gradePoints >= 4.0,
        confidence: 20,
        reason: 'A-grade investment quality',
        adjust: (a) => (a === 'HOLD' ? 'BUY_MORE' : a),
      },
      { rule: 'grade.b', when: (i) => i.gradePoints >= 3.0, confidence: 10, reason: 'B-grade investment quality' },
      {
        rule: 'grade.poor',
        when: (i) => i.gradePoints < 2.0,
        confidence: -20,
        reason: 'Poor investment grade (C- or below)',
        adjust: (a) => (isSelling(a) ? a : 'REDUCE_POSITION'),
      },
    ],
  },
  {
    factor: 'momentum',
    rules: [
      { rule: 'momentum.strong', when: (i) => (i.momentum6m ?? 0) > 15, confidence: 10, reason: 'Strong positive momentum' },
      { rule: 'momentum.negative', when: (i) => (i.momentum6m ?? 0) < -15, confidence: -10, reason: 'Negative momentum trend' },
    ],
  },
];
