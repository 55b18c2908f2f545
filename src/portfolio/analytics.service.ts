import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { engineConfig } from '../config/engine.config';
import { DASHBOARD_CACHE, SECTOR_CACHE, TtlCache } from '../common/cache/ttl-cache';
import { runPool } from '../common/concurrency/worker-pool';
import { analysisError, AnalysisResult, isAnalysisError } from '../common/interfaces/analysis-result.interface';
import { daysAgo } from '../common/utils/date.util';
import { round } from '../common/utils/stats.util';
import { LedgerService } from '../ledger/ledger.service';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { PerformanceService } from '../risk/performance.service';
import { RiskMetricsService } from '../risk/risk-metrics.service';
import { marketReturns, userRelativeReturns } from '../risk/return-series';
import { ReturnSource } from '../risk/entities/risk-profile.entity';
import { ScoringService } from '../scoring/scoring.service';
import { SECTOR_INFO_PROVIDER, SectorInfo, SectorInfoProvider } from '../market-data/interfaces/market-data-provider.interface';
import { PortfolioQueryService } from './portfolio-query.service';
import { RiskPeriod } from './dto/portfolio-query.dto';
import {
  DashboardMetrics,
  RiskAnalysis,
  SectorAllocation,
  SectorAnalysis,
  StockPerformance,
  SymbolRiskAnalysis,
} from './entities/analytics.entity';

export const RISK_PERIOD_DAYS: Record<RiskPeriod, number> = {
  '3mo': 90,
  '6mo': 180,
  '1y': 365,
  '2y': 730,
};

export const DASHBOARD_WINDOW_DAYS = 30;
const DASHBOARD_CACHE_KEY = 'dashboard_metrics';
const UNKNOWN_SECTOR: SectorInfo = { sector: 'Unknown', industry: 'Unknown' };

const NOT_HELD = 'No stocks currently held in portfolio';

// Portfolio-level analytics: per-symbol risk bundles, dashboard and sector views.
// Symbols that cannot be analysed are logged and skipped.
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private readonly ledgerService: LedgerService,
    private readonly query: PortfolioQueryService,
    private readonly replay: LedgerReplayService,
    private readonly performance: PerformanceService,
    private readonly riskMetrics: RiskMetricsService,
    private readonly scoring: ScoringService,
    @Inject(SECTOR_INFO_PROVIDER) private readonly sectors: SectorInfoProvider,
    @Inject(DASHBOARD_CACHE) private readonly dashboardCache: TtlCache<AnalysisResult<DashboardMetrics>>,
    @Inject(SECTOR_CACHE) private readonly sectorCache: TtlCache<SectorInfo>,
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  /**
   * Risk profile, scores and signal for every held symbol, plus the
   * portfolio aggregate. Returns run on split-adjusted closes over `period`.
   */
  async riskAnalysis(period?: RiskPeriod, returnSource: ReturnSource = 'user'): Promise<AnalysisResult<RiskAnalysis>> {
    const asOf = this.query.today();
    const ledger = this.ledgerService.getLedger();
    const symbols = Object.keys(this.replay.currentHoldings(ledger));
    if (symbols.length === 0) {
      return analysisError('no_holdings', NOT_HELD);
    }

    const lookback = period ? RISK_PERIOD_DAYS[period] : this.config.riskLookbackDays;
    const from = daysAgo(asOf, lookback);
    const prices = await this.query.priceHistory(symbols, from, asOf);

    const analyses: SymbolRiskAnalysis[] = [];
    const skipped: string[] = [];
    for (const symbol of symbols) {
      const performance = this.performance.userPerformance(ledger, symbol, prices.latest(symbol), asOf);
      if (isAnalysisError(performance)) {
        this.logger.warn(`Skipping ${symbol}: ${performance.error}`);
        skipped.push(symbol);
        continue;
      }

      // the carried-in bar before the window prices the holding but is not a sample
      const closes = prices.closes(symbol, from, asOf);
      if (closes.length < this.config.riskMinSamples || performance.averagePurchasePrice <= 0) {
        this.logger.warn(
          `Skipping ${symbol}: ${closes.length} prices, average cost ${performance.averagePurchasePrice}`,
        );
        skipped.push(symbol);
        continue;
      }

      const returns =
        returnSource === 'user' ? userRelativeReturns(closes, performance.averagePurchasePrice) : marketReturns(closes);
      const risk = this.riskMetrics.riskMetrics(returns, { annualizedReturn: performance.annualizedReturn });
      if (isAnalysisError(risk)) {
        this.logger.warn(`Skipping ${symbol}: ${risk.error}`);
        skipped.push(symbol);
        continue;
      }

      const riskScore = this.scoring.riskScore({
        volatility: risk.volatility,
        sharpeRatio: risk.sharpeRatio,
        maxDrawdown: risk.maxDrawdown,
        annualReturn: risk.annualizedReturn,
      });
      const grade = this.scoring.grade({
        annualReturn: risk.annualizedReturn,
        volatility: risk.volatility,
        sharpeRatio: risk.sharpeRatio,
        maxDrawdown: risk.maxDrawdown,
        riskScore: riskScore.riskScore,
      });
      const signal = this.scoring.investmentSignal({
        performance: performance.returnPercentage,
        volatility: risk.volatility,
        sharpeRatio: risk.sharpeRatio,
        maxDrawdown: risk.maxDrawdown,
        annualReturn: risk.annualizedReturn,
        daysHeld: Math.max(performance.daysHeld, 1),
        riskScore: riskScore.riskScore,
        gradePoints: grade.gradePoints,
      });

      analyses.push({
        symbol,
        performance,
        risk,
        riskScore,
        grade,
        signal,
        position: this.scoring.positionRecommendation(riskScore.riskScore, performance.returnPercentage),
      });
    }

    return {
      asOf,
      period: period ?? `${lookback}d`,
      returnSource,
      symbols: analyses,
      insights: this.scoring.portfolioInsights(
        analyses.map((analysis) => ({
          symbol: analysis.symbol,
          currentValue: analysis.performance.currentValue,
          annualizedReturn: analysis.risk.annualizedReturn,
          volatility: analysis.risk.volatility,
          sharpeRatio: analysis.risk.sharpeRatio,
          riskScore: analysis.riskScore.riskScore,
          action: analysis.signal.action,
        })),
      ),
      skipped,
    };
  }

  /** Dashboard metrics, served from the TTL cache while fresh. Errors are never cached. */
  dashboardMetrics(): Promise<AnalysisResult<DashboardMetrics>> {
    return this.dashboardCache.getOrLoad(
      DASHBOARD_CACHE_KEY,
      () => {
        this.logger.log('Dashboard cache miss, recomputing');
        return this.computeDashboard();
      },
      (result) => !isAnalysisError(result),
    );
  }

  /** Sector allocation of current holdings. Lookups run through a bounded worker pool. */
  async sectorAnalysis(): Promise<AnalysisResult<SectorAnalysis>> {
    const portfolio = await this.query.getPortfolio();
    if (portfolio.positions.length === 0) {
      return analysisError('no_holdings', NOT_HELD);
    }

    const symbols = portfolio.positions.map((pos) => pos.symbol);
    const lookups = await runPool(symbols, this.config.sectorLookupConcurrency, (symbol) => this.lookupSector(symbol));

    // merged once the pool has settled; workers never write to the cache
    lookups.forEach((lookup, index) => {
      if (lookup.status === 'fulfilled' && !lookup.value.cached) {
        this.sectorCache.set(symbols[index], lookup.value.info);
      }
    });

    const allocation: Record<string, SectorAllocation> = {};
    let totalValue = 0;
    portfolio.positions.forEach((pos, index) => {
      const lookup = lookups[index];
      let info = UNKNOWN_SECTOR;
      if (lookup.status === 'fulfilled') {
        info = lookup.value.info;
      } else {
        this.logger.warn(`Sector lookup failed for ${pos.symbol}: ${String(lookup.reason)}`);
      }
      const value = pos.currentValue ?? 0;
      totalValue += value;

      const sector = (allocation[info.sector] ??= { value: 0, percentage: 0, stocks: [], industries: {} });
      sector.value += value;
      sector.stocks.push({ symbol: pos.symbol, value: round(value, 2), percentage: 0 });
      sector.industries[info.industry] = (sector.industries[info.industry] ?? 0) + value;
    });

    if (totalValue > 0) {
      for (const sector of Object.values(allocation)) {
        sector.percentage = round((sector.value / totalValue) * 100, 2);
        sector.value = round(sector.value, 2);
        for (const stock of sector.stocks) {
          stock.percentage = round((stock.value / totalValue) * 100, 2);
        }
        for (const industry of Object.keys(sector.industries)) {
          sector.industries[industry] = round(sector.industries[industry], 2);
        }
      }
    }

    const numSectors = Object.keys(allocation).length;
    return {
      sectorAllocation: allocation,
      totalPortfolioValue: round(totalValue, 2),
      diversificationScore: diversificationScore(numSectors),
      numSectors,
      numStocks: symbols.length,
    };
  }

  // Successful lookups are cached without expiry; failures are retried next time.
  private async lookupSector(symbol: string): Promise<{ info: SectorInfo; cached: boolean }> {
    const cached = this.sectorCache.get(symbol);
    if (cached) {
      return { info: cached, cached: true };
    }
    this.logger.log(`Looking up sector for ${symbol}`);
    return { info: await this.sectors.lookup(symbol), cached: false };
  }

  private async computeDashboard(): Promise<AnalysisResult<DashboardMetrics>> {
    const asOf = this.query.today();
    const ledger = this.ledgerService.getLedger();
    const holdings = this.replay.currentHoldings(ledger);
    const symbols = Object.keys(holdings).sort();
    if (symbols.length === 0) {
      return analysisError('no_holdings', NOT_HELD);
    }

    const from = daysAgo(asOf, DASHBOARD_WINDOW_DAYS);
    const prices = await this.query.priceHistory(symbols, from, asOf);
    const performances: StockPerformance[] = [];
    let totalValue = 0;

    for (const symbol of symbols) {
      const quantity = holdings[symbol];
      const currentPrice = prices.latest(symbol) ?? 0;
      if (currentPrice === 0) {
        this.logger.warn(`No current price for ${symbol}, leaving it out of the dashboard`);
        continue;
      }
      const positionValue = quantity * currentPrice;
      totalValue += positionValue;

      const performance = this.performance.userPerformance(ledger, symbol, currentPrice, asOf);
      if (isAnalysisError(performance)) {
        performances.push({
          symbol,
          positionValue: round(positionValue, 2),
          performance30d: 0,
          gainLoss30d: 0,
          currentPrice: round(currentPrice, 2),
          userReturn: 0,
          daysHeld: 0,
          annualizedReturn: 0,
        });
        continue;
      }

      const closes = prices.closes(symbol, from, asOf);
      let performance30d = 0;
      let gainLoss30d = 0;
      if (closes.length >= 2) {
        const first = closes[0];
        const last = closes[closes.length - 1];
        performance30d = first > 0 ? round(((last - first) / first) * 100, 4) : 0;
        gainLoss30d = round((last - first) * quantity, 4);
      }

      performances.push({
        symbol,
        positionValue: round(positionValue, 2),
        performance30d,
        gainLoss30d: round(gainLoss30d, 2),
        currentPrice: round(currentPrice, 2),
        userReturn: round(performance.returnPercentage, 2),
        daysHeld: performance.daysHeld,
        annualizedReturn: round(performance.annualizedReturn, 2),
      });
    }

    return {
      asOf,
      portfolioHealth: portfolioHealth(symbols.length, performances, totalValue),
      topPerformers: performances
        .filter((p) => p.performance30d >= 0)
        .sort(
          (a, b) =>
            b.performance30d - a.performance30d ||
            b.positionValue - a.positionValue ||
            b.symbol.localeCompare(a.symbol),
        )
        .slice(0, 5),
      worstPerformers: performances
        .filter((p) => p.performance30d < 0)
        .sort(
          (a, b) =>
            a.performance30d - b.performance30d ||
            b.positionValue - a.positionValue ||
            a.symbol.localeCompare(b.symbol),
        )
        .slice(0, 5),
      concentrationRisk: concentrationRisk(performances, totalValue),
    };
  }
}

/** Holdings count (max 40) + share with positive user return × 40 + share up over 30 days × 20, capped at 100. */
export function portfolioHealth(
  numHoldings: number,
  performances: readonly StockPerformance[],
  totalValue: number,
): DashboardMetrics['portfolioHealth'] {
  const positivePerformers = performances.filter((p) => p.userReturn > 0).length;
  const positive30dPerformers = performances.filter((p) => p.performance30d > 0).length;
  const share = (count: number): number => (performances.length > 0 ? count / performances.length : 0);
  const score = Math.round(
    Math.min(numHoldings * 10, 40) + share(positivePerformers) * 40 + share(positive30dPerformers) * 20,
  );

  return {
    score: Math.min(score, 100),
    numHoldings,
    positive30dPerformers,
    totalValue: round(totalValue, 2),
    positivePerformers,
    totalPerformers: performances.length,
  };
}

/** Top-3 positions by value; concentrated when they exceed half the portfolio. */
export function concentrationRisk(
  performances: readonly StockPerformance[],
  totalValue: number,
): DashboardMetrics['concentrationRisk'] {
  if (!(totalValue > 0) || performances.length === 0) {
    return { isConcentrated: false, top3Percentage: 0, maxPositionWeight: 0, positions: [] };
  }
  const top3 = [...performances]
    .sort((a, b) => b.positionValue - a.positionValue || b.symbol.localeCompare(a.symbol))
    .slice(0, 3);
  const top3Value = top3.reduce((sum, p) => sum + p.positionValue, 0);
  const weight = (value: number): number => round((value / totalValue) * 100, 2);

  return {
    isConcentrated: top3Value / totalValue > 0.5,
    top3Percentage: weight(top3Value),
    maxPositionWeight: weight(top3[0].positionValue),
    positions: top3.map((p) => ({ symbol: p.symbol, weight: weight(p.positionValue) })),
  };
}

export function diversificationScore(numSectors: number): number {
  if (numSectors <= 1) return 0;
  if (numSectors <= 3) return 40;
  if (numSectors <= 5) return 70;
  return 90;
}
