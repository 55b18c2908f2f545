import { Injectable } from '@nestjs/common';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { CostBasisService } from '../cost-basis/cost-basis.service';
import { Ledger, orderLedger, TransactionType } from '../ledger/entities/transaction.entity';
import { UserPerformance } from '../cost-basis/entities/cost-basis.entity';
import { analysisError, AnalysisResult } from '../common/interfaces/analysis-result.interface';
import { daysBetween, IsoDate } from '../common/utils/date.util';
import { cagr } from './return-series';

// Investor-relative performance: what the held shares cost versus what they are worth.
@Injectable()
export class PerformanceService {
  constructor(
    private readonly replay: LedgerReplayService,
    private readonly costBasis: CostBasisService,
  ) {}

  /**
   * Return since purchase for a currently held symbol.
   * Days held count from the first buy to `today`; annualized return is the CAGR
   * from FIFO cost basis to current value.
   */
  userPerformance(
    ledger: Ledger,
    symbol: string,
    currentPrice: number | undefined,
    today: IsoDate,
  ): AnalysisResult<UserPerformance> {
    const quantity = this.replay.currentHoldings(ledger)[symbol] ?? 0;
    if (quantity <= 0) {
      return analysisError('no_holdings', `Stock not currently held: ${symbol}`);
    }
    if (currentPrice === undefined || !(currentPrice > 0)) {
      return analysisError('missing_price', `Could not find a current price for ${symbol}`);
    }

    const { totalCost, averageUnitCost } = this.costBasis.costBasisFifo(ledger, symbol, quantity);
    const currentValue = quantity * currentPrice;
    const returnAmount = currentValue - totalCost;
    const firstPurchase = orderLedger(ledger).find(
      (tx) => tx.symbol === symbol && tx.type === TransactionType.BUY,
    );
    const daysHeld = firstPurchase ? daysBetween(firstPurchase.date, today) : 0;

    return {
      symbol,
      quantity,
      costBasis: totalCost,
      currentValue,
      averagePurchasePrice: averageUnitCost,
      currentPrice,
      returnAmount,
      returnPercentage: totalCost > 0 ? (returnAmount / totalCost) * 100 : 0,
      firstPurchaseDate: firstPurchase?.date ?? null,
      daysHeld,
      annualizedReturn: cagr(totalCost, currentValue, daysHeld),
    };
  }
}
