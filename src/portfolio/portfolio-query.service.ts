import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { CLOCK, Clock } from '../common/clock/clock';
import { engineConfig } from '../config/engine.config';
import { IsoDate, toIsoDate } from '../common/utils/date.util';
import { toMoney, toNumber } from '../common/utils/decimal.util';
import { LedgerService } from '../ledger/ledger.service';
import { Ledger } from '../ledger/entities/transaction.entity';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { CostBasisService } from '../cost-basis/cost-basis.service';
import { CorporateActionService } from '../corporate-actions/corporate-action.service';
import { ValuationService } from '../valuation/valuation.service';
import { SymbolPerformance, ValuationPoint } from '../valuation/entities/valuation-point.entity';
import { PriceSeries } from '../market-data/price-series';
import {
  FX_RATE_PROVIDER,
  FxRateProvider,
  PRICE_SERIES_PROVIDER,
  PriceSeriesProvider,
} from '../market-data/interfaces/market-data-provider.interface';
import { analysisError, AnalysisResult } from '../common/interfaces/analysis-result.interface';
import { CashResponseDto, PortfolioResponseDto, PositionDto } from './dto/portfolio-response.dto';
import { PnlResponseDto, RealizedPnlDto, UnrealizedPnlDto } from './dto/pnl-response.dto';

// Read-only operations over the ledger.
// CQRS pattern - queries separated from mutations; everything is replayed per call.
@Injectable()
export class PortfolioQueryService {
  constructor(
    private readonly ledgerService: LedgerService,
    private readonly replay: LedgerReplayService,
    private readonly costBasis: CostBasisService,
    private readonly corporateActions: CorporateActionService,
    private readonly valuation: ValuationService,
    @Inject(PRICE_SERIES_PROVIDER) private readonly prices: PriceSeriesProvider,
    @Inject(FX_RATE_PROVIDER) private readonly fx: FxRateProvider,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  today(): IsoDate {
    return toIsoDate(this.clock.now());
  }

  /** Split-adjusted history for `symbols` over `[start, end]`. */
  async priceHistory(symbols: readonly string[], start: IsoDate, end: IsoDate): Promise<PriceSeries> {
    const series = await this.prices.getPrices(symbols, start, end);
    return this.corporateActions.applyKnownSplits(series);
  }

  /**
   * Returns current holdings with FIFO cost basis and unrealized P&L.
   * Excludes symbols at or below the holding epsilon.
   * Positions without a price on or before today carry null valuation fields.
   *
   * @param symbol - Optional filter for a single position
   */
  async getPortfolio(symbol?: string): Promise<PortfolioResponseDto> {
    const asOf = this.today();
    const ledger = this.ledgerService.getLedger();
    const holdings = this.replay.currentHoldings(ledger);
    const symbols = Object.keys(holdings).filter((held) => symbol === undefined || held === symbol);
    const prices = await this.priceHistory(symbols, firstDate(ledger) ?? asOf, asOf);

    const positions = symbols.map((held): PositionDto => {
      const quantity = holdings[held];
      const { totalCost, averageUnitCost } = this.costBasis.costBasisFifo(ledger, held, quantity);
      const currentPrice = prices.asof(held, asOf);

      if (currentPrice === undefined) {
        return {
          symbol: held,
          quantity,
          costBasis: totalCost,
          averageCost: averageUnitCost,
          currentPrice: null,
          currentValue: null,
          unrealizedPnl: null,
          unrealizedPnlPercent: null,
        };
      }

      const currentValue = quantity * currentPrice;
      const unrealizedPnl = currentValue - totalCost;
      return {
        symbol: held,
        quantity,
        costBasis: totalCost,
        averageCost: averageUnitCost,
        currentPrice,
        currentValue,
        unrealizedPnl,
        unrealizedPnlPercent: totalCost > 0 ? (unrealizedPnl / totalCost) * 100 : 0,
      };
    });

    const totalValue = positions.reduce((sum, pos) => sum + (pos.currentValue ?? 0), 0);
    const rate = await this.fx.latestRate(this.config.baseCurrency, this.config.quoteCurrency);

    return {
      asOf,
      positions,
      totalCost: toMoney(positions.reduce((sum, pos) => sum + pos.costBasis, 0)),
      totalValue: toMoney(totalValue),
      totalUnrealizedPnl: toMoney(positions.reduce((sum, pos) => sum + (pos.unrealizedPnl ?? 0), 0)),
      quoteCurrency: this.config.quoteCurrency,
      totalValueInQuote: rate !== undefined && rate > 0 ? toMoney(totalValue / rate) : null,
    };
  }

  /**
   * Calculates realized + unrealized P&L across the portfolio.
   * Realized: FIFO matches of priced sells against lots
   * Unrealized: priced open positions against FIFO cost
   *
   * @param symbols - Optional filter for specific symbols
   */
  async getPnl(symbols?: string[]): Promise<PnlResponseDto> {
    const wanted = symbols && symbols.length > 0 ? new Set(symbols) : undefined;
    const ledger = this.ledgerService.getLedger();
    const traded = [...new Set(ledger.flatMap((tx) => (tx.symbol ? [tx.symbol] : [])))]
      .filter((symbol) => wanted === undefined || wanted.has(symbol))
      .sort();

    const realizedPnl = traded
      .map((symbol): RealizedPnlDto => {
        const { totalPnl, totalQuantity } = this.costBasis.realizedPnl(ledger, symbol);
        return { symbol, realizedPnl: toNumber(totalPnl), closedQuantity: toNumber(totalQuantity) };
      })
      .filter((item) => item.closedQuantity > 0);

    const portfolio = await this.getPortfolio();
    const unrealizedPnl = portfolio.positions
      .filter((pos) => wanted === undefined || wanted.has(pos.symbol))
      .flatMap((pos): UnrealizedPnlDto[] =>
        pos.currentPrice === null || pos.unrealizedPnl === null
          ? []
          : [
              {
                symbol: pos.symbol,
                unrealizedPnl: pos.unrealizedPnl,
                currentQuantity: pos.quantity,
                averageCost: pos.averageCost,
                currentPrice: pos.currentPrice,
              },
            ],
      );

    const totalRealizedPnl = realizedPnl.reduce((sum, item) => sum + item.realizedPnl, 0);
    const totalUnrealizedPnl = unrealizedPnl.reduce((sum, item) => sum + item.unrealizedPnl, 0);

    return {
      realizedPnl,
      unrealizedPnl,
      totalRealizedPnl: toMoney(totalRealizedPnl),
      totalUnrealizedPnl: toMoney(totalUnrealizedPnl),
      netPnl: toMoney(totalRealizedPnl + totalUnrealizedPnl),
    };
  }

  /** Replayed cash balance in the base currency, inclusive of `date` (default today). */
  getCash(date?: IsoDate): CashResponseDto {
    const asOf = date ?? this.today();
    return {
      date: asOf,
      currency: this.config.baseCurrency,
      balance: this.replay.cashBalanceAsOf(this.ledgerService.getLedger(), asOf),
    };
  }

  /**
   * Daily valuation from `start` (default: first transaction) to `end`
   * (default: today), with the configured FX pair for the quote-currency value.
   */
  async getTimeline(start?: IsoDate, end?: IsoDate): Promise<ValuationPoint[]> {
    const ledger = this.ledgerService.getLedger();
    const from = start ?? firstDate(ledger);
    if (from === undefined) {
      return [];
    }
    const to = end ?? this.today();
    const symbols = [...new Set(ledger.flatMap((tx) => (tx.symbol ? [tx.symbol] : [])))].sort();
    const prices = await this.priceHistory([...symbols, this.config.fxSymbol], from, to);

    return this.valuation.portfolioTimeline(ledger, prices, from, to, { fxSymbol: this.config.fxSymbol });
  }

  /**
   * Daily and cumulative performance of a held symbol against its FIFO average cost,
   * from its first transaction (or `start`) to `end` (default today).
   */
  async getSymbolPerformance(
    symbol: string,
    start?: IsoDate,
    end?: IsoDate,
  ): Promise<AnalysisResult<SymbolPerformance>> {
    const ledger = this.ledgerService.getLedger({ symbol });
    const quantity = this.replay.currentHoldings(ledger)[symbol];
    if (quantity === undefined) {
      return analysisError('no_holdings', `Stock not currently held: ${symbol}`);
    }

    const from = start ?? firstDate(ledger) ?? this.today();
    const to = end ?? this.today();
    const { averageUnitCost } = this.costBasis.costBasisFifo(ledger, symbol, quantity);
    const prices = await this.priceHistory([symbol], from, to);

    return {
      symbol,
      averageCost: averageUnitCost,
      points: this.valuation.symbolPerformance(prices, symbol, averageUnitCost, from, to),
    };
  }
}

function firstDate(ledger: Ledger): IsoDate | undefined {
  return ledger.length > 0 ? ledger[0].date : undefined;
}
