export interface RiskScoreInputs {
  volatility: number;
  sharpeRatio: number;
  maxDrawdown: number;
  annualReturn: number;
  sortinoRatio?: number;      // default 0
  beta?: number;              // default 1
  momentum6m?: number;        // default 0
}

export interface RiskScore {
  riskScore: number;          // integer in [0, 100], higher is better
  riskCategory: string;
  riskDescription: string;
  componentScores: {
    volatility: number;
    sharpeRatio: number;
    maxDrawdown: number;
    sortinoRatio: number;
    beta: number;
    momentum6m: number;
    annualReturn: number;
  };
}

export interface GradeInputs {
  annualReturn: number;
  volatility: number;
  sharpeRatio: number;
  sortinoRatio?: number;
  maxDrawdown?: number;
  riskScore?: number;         // default 50
}

export interface PerformanceGrade {
  grade: string;
  gradePoints: number;
  description: string;
  investmentTier: string;
  recommendation: string;
  scoreBreakdown: {
    totalScore: number;
    returnPoints: number;
    sharpePoints: number;
    volatilityPoints: number;
    drawdownPoints: number;
    sortinoPoints: number;
  };
  qualitativeAssessment: {
    riskQuality: string;
    returnQuality: string;
    overallAssessment: string;
  };
}

export interface PositionRecommendation {
  size: string;
  percentageOfPortfolio: string;
  rationale: string;
}

export type BaseAction =
  | 'STRONG_BUY'
  | 'BUY_MORE'
  | 'BUY_SMALL'
  | 'HOLD'
  | 'MONITOR'
  | 'REDUCE_POSITION'
  | 'CONSIDER_SELL';

export type SignalAction = Exclude<BaseAction, 'MONITOR'> | 'MONITOR_CLOSELY';

export type ConfidenceLevel = 'VERY_HIGH' | 'HIGH' | 'MEDIUM' | 'LOW' | 'VERY_LOW';

export type SignalStrength = 'STRONG_POSITIVE' | 'POSITIVE' | 'NEUTRAL' | 'NEGATIVE';

export interface SignalInputs {
  performance: number;        // % return versus cost basis
  volatility: number;
  sharpeRatio: number;
  maxDrawdown: number;
  annualReturn: number;
  daysHeld: number;
  riskScore: number;
  gradePoints: number;
  momentum6m?: number;
}

// One fired rule: how it moved confidence and the action.
export interface SignalAuditEntry {
  rule: string;
  reason: string;
  confidenceDelta: number;
  actionBefore: BaseAction | null;    // null for the initial classification
  actionAfter: BaseAction;
}

export interface InvestmentSignal {
  action: SignalAction;
  baseAction: BaseAction;             // initial classification, before adjustments
  strength: SignalStrength;
  reasoning: string;
  confidence: ConfidenceLevel;
  confidenceScore: number;
  audit: SignalAuditEntry[];
}

/** Everything scored for one held symbol. */
export interface ScoringBundle {
  riskScore: RiskScore;
  grade: PerformanceGrade;
  signal: InvestmentSignal;
  position: PositionRecommendation;
}
