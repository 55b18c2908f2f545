import { portfolioGrade, portfolioInsights, portfolioStrategy } from './portfolio-insights';
import { SCORING_TABLES } from './score-bands';
import { InsightInput } from './entities/portfolio-insights.entity';

describe('portfolio insights', () => {
  const rules = SCORING_TABLES.portfolioGrade;

  const input = (overrides: Partial<InsightInput> & Pick<InsightInput, 'symbol'>): InsightInput => ({
    currentValue: 1000,
    annualizedReturn: 0,
    volatility: 20,
    sharpeRatio: 0,
    riskScore: 50,
    action: 'HOLD',
    ...overrides,
  });

  describe('portfolioInsights', () => {
    it('should weight return and volatility by position value', () => {
      const insights = portfolioInsights(
        [
          input({ symbol: 'AKBNK', currentValue: 6000, annualizedReturn: 20, volatility: 30, sharpeRatio: 1.2, riskScore: 70, action: 'STRONG_BUY' }),
          input({ symbol: 'SISE', currentValue: 4000, annualizedReturn: 5, volatility: 50, sharpeRatio: 0.4, riskScore: 30, action: 'CONSIDER_SELL' }),
        ],
        rules,
      );

      expect(insights).toEqual({
        portfolioSummary: {
          totalValue: 10000,
          weightedAnnualReturn: 14,
          weightedVolatility: 38,
          averageSharpeRatio: 0.8,
          portfolioGrade: { grade: 'B+', description: 'Good portfolio performance' },
        },
        actionSummary: {
          strongBuys: ['AKBNK'],
          buyMore: [],
          holds: [],
          considerSells: ['SISE'],
          strongBuyCount: 1,
          totalStocks: 2,
        },
        riskAnalysis: {
          highRiskStocks: ['SISE'],
          highRiskExposurePercent: 40,
          riskLevel: 'MEDIUM',
        },
        strategyRecommendation: {
          strategy: 'AGGRESSIVE_GROWTH',
          description: 'Focus on 1 strong performers. Consider increasing positions.',
        },
      });
    });

    it('should count reduce-position signals as sells', () => {
      const insights = portfolioInsights([input({ symbol: 'SISE', action: 'REDUCE_POSITION' })], rules);

      expect(insights?.actionSummary.considerSells).toEqual(['SISE']);
    });

    it('should return null for an empty portfolio', () => {
      expect(portfolioInsights([], rules)).toBeNull();
    });
  });

  describe('portfolioGrade', () => {
    it.each([
      [20, 25, 0.6, 'A'],
      [20, 25, 0.4, 'B+'],
      [7, 60, 0, 'B'],
      [1, 60, 0, 'C'],
      [-1, 10, 2, 'D'],
    ])('should grade return %p, volatility %p, Sharpe %p as %s', (ret, vol, sharpe, grade) => {
      expect(portfolioGrade(rules, ret, vol, sharpe).grade).toBe(grade);
    });
  });

  describe('portfolioStrategy', () => {
    const groups = (counts: { strongBuys?: number; buyMore?: number; holds?: number; considerSells?: number }) => {
      const symbols = (prefix: string, n = 0) => Array.from({ length: n }, (_, i) => `${prefix}${i}`);
      return {
        strongBuys: symbols('S', counts.strongBuys),
        buyMore: symbols('B', counts.buyMore),
        holds: symbols('H', counts.holds),
        considerSells: symbols('C', counts.considerSells),
      };
    };

    it('should favour adding when most holdings are buy-more', () => {
      expect(portfolioStrategy(groups({ buyMore: 3, holds: 2 }), 5, 20)).toEqual({
        strategy: 'MODERATE_GROWTH',
        description: 'Good opportunity to increase positions in 3 stocks.',
      });
    });

    it('should not go aggressive on strong buys without a double-digit return', () => {
      expect(portfolioStrategy(groups({ strongBuys: 1, holds: 4 }), 10, 20).strategy).toBe('BALANCED_HOLD');
    });

    it('should suggest cleanup when sells pass 30%', () => {
      expect(portfolioStrategy(groups({ considerSells: 2, holds: 3 }), 5, 20)).toEqual({
        strategy: 'PORTFOLIO_CLEANUP',
        description: 'Consider reducing or selling 2 underperforming stocks.',
      });
    });

    it('should suggest risk reduction for high volatility', () => {
      expect(portfolioStrategy(groups({ holds: 5 }), 5, 55).strategy).toBe('RISK_REDUCTION');
    });

    it('should default to a balanced hold', () => {
      expect(portfolioStrategy(groups({ holds: 5 }), 5, 20)).toEqual({
        strategy: 'BALANCED_HOLD',
        description: 'Maintain current positions and monitor performance.',
      });
    });
  });
});
