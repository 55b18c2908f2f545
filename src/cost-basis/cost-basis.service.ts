import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Ledger, orderLedger, PURCHASE_TYPES, Transaction, TransactionType, ZERO_COST_SHARE_TYPES } from '../ledger/entities/transaction.entity';
import { Lot } from './entities/lot.entity';
import { RealizedPnlAggregate, RealizedPnlRecord } from './entities/realized-pnl-record.entity';
import { CostBasis } from './entities/cost-basis.entity';
import { safeDivide, toDecimal, toNumber, ZERO } from '../common/utils/decimal.util';

export interface FifoReplay {
  lots: Lot[];                    // surviving lots, oldest first
  realized: RealizedPnlRecord[];
}

// FIFO lot matching, rebuilt from the ledger on every call.
// Pure: same ledger in, same lots and costs out.
@Injectable()
export class CostBasisService {
  /**
   * Replays one symbol's transactions into a FIFO queue.
   * Buy: appends a lot at the purchase price.
   * Split: appends a zero-cost lot for the net new shares, which lowers the
   * average cost instead of rescaling existing lots.
   * Sell: consumes lots oldest first; any excess over the queue is dropped.
   */
  fifoReplay(ledger: Ledger, symbol: string): FifoReplay {
    const lots: Lot[] = [];
    const realized: RealizedPnlRecord[] = [];

    for (const tx of orderLedger(ledger)) {
      if (tx.symbol !== symbol) {
        continue;
      }
      if (PURCHASE_TYPES.has(tx.type)) {
        lots.push(this.lotFrom(tx, tx.price ?? ZERO));
      } else if (ZERO_COST_SHARE_TYPES.has(tx.type)) {
        if (tx.quantity.greaterThan(0)) {
          lots.push(this.lotFrom(tx, ZERO));
        }
      } else if (tx.type === TransactionType.SELL) {
        this.consume(lots, tx, realized);
      }
    }

    return { lots, realized };
  }

  /**
   * Cost attributable to a holding of `quantity`, walking surviving lots oldest first.
   * Average unit cost is total cost / quantity, 0 when quantity ≤ 0.
   */
  costBasisFifo(ledger: Ledger, symbol: string, quantity: number): CostBasis {
    const { lots } = this.fifoReplay(ledger, symbol);
    const target = toDecimal(quantity);
    let needed = target;
    let totalCost = ZERO;

    for (const lot of lots) {
      if (needed.lessThanOrEqualTo(0)) {
        break;
      }
      const take = Decimal.min(needed, lot.quantity);
      totalCost = totalCost.plus(take.times(lot.unitCost));
      needed = needed.minus(take);
    }

    const averageUnitCost = target.greaterThan(0) ? safeDivide(totalCost, target) : ZERO;
    return {
      totalCost: toNumber(totalCost),
      averageUnitCost: toNumber(averageUnitCost),
    };
  }

  /** Sum of realized P&L and closed quantity for a symbol */
  realizedPnl(ledger: Ledger, symbol: string): RealizedPnlAggregate {
    return this.fifoReplay(ledger, symbol).realized.reduce<RealizedPnlAggregate>(
      (aggregate, record) => ({
        totalPnl: aggregate.totalPnl.plus(record.pnl),
        totalQuantity: aggregate.totalQuantity.plus(record.quantity),
      }),
      { totalPnl: ZERO, totalQuantity: ZERO },
    );
  }

  private lotFrom(tx: Transaction, unitCost: Decimal): Lot {
    return {
      symbol: tx.symbol ?? '',
      quantity: tx.quantity,
      unitCost,
      acquisitionDate: tx.date,
      transactionId: tx.id,
    };
  }

  // Consumes lots via FIFO, recording realized P&L when the sell carries a price.
  // Supports partial lot consumption. Lots are replaced, never mutated, so
  // ledger-owned Decimals stay untouched.
  private consume(lots: Lot[], sell: Transaction, realized: RealizedPnlRecord[]): void {
    let remaining = sell.quantity;

    while (remaining.greaterThan(0) && lots.length > 0) {
      const oldestLot = lots[0];
      const consumed = Decimal.min(oldestLot.quantity, remaining);

      if (sell.price !== undefined) {
        realized.push({
          symbol: oldestLot.symbol,
          quantity: consumed,
          buyPrice: oldestLot.unitCost,
          sellPrice: sell.price,
          pnl: sell.price.minus(oldestLot.unitCost).times(consumed),
          date: sell.date,
        });
      }

      if (oldestLot.quantity.lessThanOrEqualTo(remaining)) {
        // full lot consumption
        lots.shift();
      } else {
        // partial lot
        lots[0] = { ...oldestLot, quantity: oldestLot.quantity.minus(remaining) };
      }
      remaining = remaining.minus(consumed);
    }
  }
}
