import { IsoDate } from '../../common/utils/date.util';
import { RiskProfile, ReturnSource } from '../../risk/entities/risk-profile.entity';
import { UserPerformance } from '../../cost-basis/entities/cost-basis.entity';
import { ScoringBundle } from '../../scoring/entities/scoring.entity';
import { PortfolioInsights } from '../../scoring/entities/portfolio-insights.entity';

// Risk profile, performance and scores for one held symbol
export interface SymbolRiskAnalysis extends ScoringBundle {
  symbol: string;
  performance: UserPerformance;
  risk: RiskProfile;
}

export interface RiskAnalysis {
  asOf: IsoDate;
  period: string;
  returnSource: ReturnSource;
  symbols: SymbolRiskAnalysis[];
  insights: PortfolioInsights | null;   // null when no symbol could be scored
  skipped: string[];
}

export interface StockPerformance {
  symbol: string;
  positionValue: number;
  performance30d: number;
  gainLoss30d: number;
  currentPrice: number;
  userReturn: number;
  daysHeld: number;
  annualizedReturn: number;
}

export interface DashboardMetrics {
  asOf: IsoDate;
  portfolioHealth: {
    score: number;
    numHoldings: number;
    positive30dPerformers: number;
    totalValue: number;
    positivePerformers: number;
    totalPerformers: number;
  };
  topPerformers: StockPerformance[];
  worstPerformers: StockPerformance[];
  concentrationRisk: {
    isConcentrated: boolean;
    top3Percentage: number;
    maxPositionWeight: number;
    positions: Array<{ symbol: string; weight: number }>;
  };
}

export interface SectorStock {
  symbol: string;
  value: number;
  percentage: number;
}

export interface SectorAllocation {
  value: number;
  percentage: number;
  stocks: SectorStock[];
  industries: Record<string, number>;
}

export interface SectorAnalysis {
  sectorAllocation: Record<string, SectorAllocation>;
  totalPortfolioValue: number;
  diversificationScore: number;
  numSectors: number;
  numStocks: number;
}
