import { Controller, Get, HttpCode, HttpStatus, Param, Query } from '@nestjs/common';
import { PortfolioQueryService } from './portfolio-query.service';
import { AnalyticsService } from './analytics.service';
import { CashResponseDto, PortfolioResponseDto } from './dto/portfolio-response.dto';
import { PnlResponseDto } from './dto/pnl-response.dto';
import { CashQueryDto, RiskQueryDto, TimelineQueryDto } from './dto/portfolio-query.dto';
import { SymbolPerformance, ValuationPoint } from '../valuation/entities/valuation-point.entity';
import { AnalysisResult } from '../common/interfaces/analysis-result.interface';
import { DashboardMetrics, RiskAnalysis, SectorAnalysis } from './entities/analytics.entity';

@Controller('portfolio')
export class PortfolioController {
  constructor(
    private readonly queryService: PortfolioQueryService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  /**
   * Returns current holdings with FIFO cost basis and unrealized P&L.
   *
   * GET /portfolio/positions?symbol=THYAO
   * @param symbol - Optional filter for single position
   */
  @Get('positions')
  @HttpCode(HttpStatus.OK)
  getPortfolio(@Query('symbol') symbol?: string): Promise<PortfolioResponseDto> {
    return this.queryService.getPortfolio(symbol);
  }

  /**
   * Calculates realized + unrealized P&L.
   *
   * GET /portfolio/pnl?symbols=THYAO,SISE
   * @param symbolsQuery - Comma-separated symbols or omit for all
   */
  @Get('pnl')
  @HttpCode(HttpStatus.OK)
  getPnl(@Query('symbols') symbolsQuery?: string): Promise<PnlResponseDto> {
    const symbols = symbolsQuery ? symbolsQuery.split(',').map((s) => s.trim()) : undefined;
    return this.queryService.getPnl(symbols);
  }

  /**
   * Cash balance replayed from deposits, withdrawals, trades and dividends.
   *
   * GET /portfolio/cash?date=2024-06-30
   */
  @Get('cash')
  @HttpCode(HttpStatus.OK)
  getCash(@Query() query: CashQueryDto): CashResponseDto {
    return this.queryService.getCash(query.date);
  }

  /**
   * Daily portfolio valuation with quote-currency conversion.
   *
   * GET /portfolio/timeline?start=2024-01-01&end=2024-03-31
   */
  @Get('timeline')
  @HttpCode(HttpStatus.OK)
  getTimeline(@Query() query: TimelineQueryDto): Promise<ValuationPoint[]> {
    return this.queryService.getTimeline(query.start, query.end);
  }

  /**
   * Daily and cumulative performance of one holding against its average cost.
   *
   * GET /portfolio/performance/THYAO?start=2024-01-01
   */
  @Get('performance/:symbol')
  @HttpCode(HttpStatus.OK)
  getSymbolPerformance(
    @Param('symbol') symbol: string,
    @Query() query: TimelineQueryDto,
  ): Promise<AnalysisResult<SymbolPerformance>> {
    return this.queryService.getSymbolPerformance(symbol, query.start, query.end);
  }

  /**
   * Per-symbol risk profiles, scores and signals with portfolio insights.
   *
   * GET /portfolio/risk?period=1y
   */
  @Get('risk')
  @HttpCode(HttpStatus.OK)
  getRisk(@Query() query: RiskQueryDto): Promise<AnalysisResult<RiskAnalysis>> {
    return this.analyticsService.riskAnalysis(query.period, query.returns);
  }

  /**
   * Health score, 30-day movers and concentration. Cached briefly.
   *
   * GET /portfolio/dashboard
   */
  @Get('dashboard')
  @HttpCode(HttpStatus.OK)
  getDashboard(): Promise<AnalysisResult<DashboardMetrics>> {
    return this.analyticsService.dashboardMetrics();
  }

  /**
   * Sector allocation and diversification score.
   *
   * GET /portfolio/sectors
   */
  @Get('sectors')
  @HttpCode(HttpStatus.OK)
  getSectors(): Promise<AnalysisResult<SectorAnalysis>> {
    return this.analyticsService.sectorAnalysis();
  }
}
