import { Test, TestingModule } from '@nestjs/testing';
import { RiskMetricsService, TRADING_DAYS_PER_YEAR } from './risk-metrics.service';
import { DEFAULT_ENGINE_CONFIG, engineConfig } from '../config/engine.config';
import { isAnalysisError } from '../common/interfaces/analysis-result.interface';

describe('RiskMetricsService', () => {
  let service: RiskMetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [RiskMetricsService, { provide: engineConfig.KEY, useValue: DEFAULT_ENGINE_CONFIG }],
    }).compile();

    service = module.get<RiskMetricsService>(RiskMetricsService);
  });

  describe('riskMetrics', () => {
    it('should refuse series shorter than the minimum sample size', () => {
      const result = service.riskMetrics([0.01, -0.01, 0.02, 0]);

      expect(result).toEqual({
        reason: 'insufficient_data',
        error: 'Insufficient data: 4 returns, at least 5 required',
      });
    });

    it('should honour an explicit minimum sample size', () => {
      expect(isAnalysisError(service.riskMetrics([0.01, 0.02], { minSamples: 2 }))).toBe(false);
      expect(isAnalysisError(service.riskMetrics([0.01, 0.02], { minSamples: 3 }))).toBe(true);
    });

    it('should report a zero Sharpe ratio for a flat series', () => {
      const result = service.riskMetrics([0, 0, 0, 0, 0]);

      expect(result).toEqual({
        volatility: 0,
        annualizedReturn: 0,
        sharpeRatio: 0,
        maxDrawdown: 0,
        var95: 0,
        sampleSize: 5,
      });
    });

    it('should divide the supplied annual return by volatility', () => {
      const result = service.riskMetrics([0.01, -0.01, 0.01, -0.01, 0.01, -0.01], { annualizedReturn: 20 });

      if (isAnalysisError(result)) {
        throw new Error(result.error);
      }
      expect(result.annualizedReturn).toBe(20);
      expect(result.sharpeRatio).toBeCloseTo(20 / Math.sqrt(TRADING_DAYS_PER_YEAR), 8);
    });
  });

  describe('volatility', () => {
    it('should annualize the population standard deviation in percent', () => {
      expect(service.volatility([0.01, -0.01, 0.01, -0.01])).toBeCloseTo(Math.sqrt(252), 8);
    });
  });

  describe('maxDrawdown', () => {
    it('should measure the worst fall from the compounded peak', () => {
      // wealth 1.1 → 0.55 → 0.66
      expect(service.maxDrawdown([0.1, -0.5, 0.2])).toBeCloseTo(-50, 8);
    });

    it('should be 0 when wealth never falls', () => {
      expect(service.maxDrawdown([0.01, 0, 0.02])).toBe(0);
    });

    it('should count a first-day loss against the first compounded value only', () => {
      expect(service.maxDrawdown([-0.1, -0.1])).toBeCloseTo(-10, 8);
    });
  });

  describe('valueAtRisk', () => {
    it('should interpolate the 5th percentile of daily returns', () => {
      // sorted [-5, -2, 0, 1, 3], rank 0.2
      expect(service.valueAtRisk([0.03, -0.02, 0, 0.01, -0.05])).toBeCloseTo(-4.4, 8);
    });
  });
});
