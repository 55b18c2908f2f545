import { SignalAction } from './scoring.entity';

/** Per-symbol figures the portfolio aggregate needs. */
export interface InsightInput {
  symbol: string;
  currentValue: number;
  annualizedReturn: number;
  volatility: number;
  sharpeRatio: number;
  riskScore: number;
  action: SignalAction;
}

export type PortfolioStrategy =
  | 'AGGRESSIVE_GROWTH'
  | 'MODERATE_GROWTH'
  | 'PORTFOLIO_CLEANUP'
  | 'RISK_REDUCTION'
  | 'BALANCED_HOLD';

export type ExposureLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface PortfolioInsights {
  portfolioSummary: {
    totalValue: number;
    weightedAnnualReturn: number;
    weightedVolatility: number;
    averageSharpeRatio: number;
    portfolioGrade: { grade: string; description: string };
  };
  actionSummary: {
    strongBuys: string[];
    buyMore: string[];
    holds: string[];
    considerSells: string[];
    strongBuyCount: number;
    totalStocks: number;
  };
  riskAnalysis: {
    highRiskStocks: string[];
    highRiskExposurePercent: number;
    riskLevel: ExposureLevel;
  };
  strategyRecommendation: {
    strategy: PortfolioStrategy;
    description: string;
  };
}
