import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Ledger, orderLedger, Transaction, TransactionType } from './entities/transaction.entity';
import { IsoDate } from '../common/utils/date.util';
import { toNumber, ZERO } from '../common/utils/decimal.util';

/**
 * A symbol counts as currently held only above this quantity.
 * Absorbs float residue left by fractional sells.
 */
export const HOLDING_EPSILON = 1e-3;

export type HoldingSnapshot = Record<string, number>;

// Mutable replay state. Quantities may go negative on oversell.
export interface LedgerState {
  holdings: Map<string, Decimal>;
  cash: Decimal;
}

// Deterministic reconstruction of share quantities and cash from the ledger.
@Injectable()
export class LedgerReplayService {
  emptyState(): LedgerState {
    return { holdings: new Map(), cash: ZERO };
  }

  /**
   * Applies one transaction in place.
   * Buy / rights issue / split / capital increase add shares, sell removes them.
   * Sells beyond the held quantity are not rejected.
   */
  apply(state: LedgerState, tx: Transaction): void {
    const price = tx.price ?? ZERO;

    switch (tx.type) {
      case TransactionType.BUY:
      case TransactionType.RIGHTS_ISSUE:
        this.adjustHolding(state, tx.symbol, tx.quantity);
        state.cash = state.cash.minus(tx.quantity.times(price));
        break;
      case TransactionType.SELL:
        this.adjustHolding(state, tx.symbol, tx.quantity.negated());
        state.cash = state.cash.plus(tx.quantity.times(price));
        break;
      case TransactionType.SPLIT:
      case TransactionType.CAPITAL_INCREASE:
        this.adjustHolding(state, tx.symbol, tx.quantity);
        break;
      case TransactionType.DEPOSIT:
        state.cash = state.cash.plus(tx.quantity);
        break;
      case TransactionType.WITHDRAWAL:
        state.cash = state.cash.minus(tx.quantity);
        break;
      case TransactionType.DIVIDEND:
        // price holds the total cash amount
        state.cash = state.cash.plus(price);
        break;
    }
  }

  /** Replays every transaction accepted by `include`, in ledger order. */
  replay(ledger: Ledger, include: (tx: Transaction) => boolean = () => true): LedgerState {
    const state = this.emptyState();
    for (const tx of orderLedger(ledger)) {
      if (include(tx)) {
        this.apply(state, tx);
      }
    }
    return state;
  }

  /** Quantities per symbol including transactions dated on `date`. Zero and negative quantities included. */
  holdingsAsOf(ledger: Ledger, date: IsoDate): HoldingSnapshot {
    return this.snapshot(this.replay(ledger, (tx) => tx.date <= date));
  }

  /** Shares of `symbol` held strictly before `date`. */
  holdingsBefore(ledger: Ledger, symbol: string, date: IsoDate): number {
    const state = this.replay(ledger, (tx) => tx.symbol === symbol && tx.date < date);
    return toNumber(state.holdings.get(symbol) ?? ZERO);
  }

  cashBalanceAsOf(ledger: Ledger, date: IsoDate): number {
    return toNumber(this.replay(ledger, (tx) => tx.date <= date).cash);
  }

  /**
   * Symbols held above HOLDING_EPSILON, optionally as of a date.
   * Symbols are returned in alphabetical order.
   */
  currentHoldings(ledger: Ledger, asOf?: IsoDate): HoldingSnapshot {
    const state = this.replay(ledger, (tx) => asOf === undefined || tx.date <= asOf);
    const held: HoldingSnapshot = {};
    for (const [symbol, quantity] of [...state.holdings.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      if (isHeld(quantity)) {
        held[symbol] = toNumber(quantity);
      }
    }
    return held;
  }

  private snapshot(state: LedgerState): HoldingSnapshot {
    const result: HoldingSnapshot = {};
    state.holdings.forEach((quantity, symbol) => {
      result[symbol] = toNumber(quantity);
    });
    return result;
  }

  private adjustHolding(state: LedgerState, symbol: string | undefined, delta: Decimal): void {
    if (!symbol) {
      return;
    }
    state.holdings.set(symbol, (state.holdings.get(symbol) ?? ZERO).plus(delta));
  }
}

export function isHeld(quantity: Decimal | number): boolean {
  return typeof quantity === 'number' ? quantity > HOLDING_EPSILON : quantity.greaterThan(HOLDING_EPSILON);
}
