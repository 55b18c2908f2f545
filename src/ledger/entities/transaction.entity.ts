import Decimal from 'decimal.js';
import { IsoDate } from '../../common/utils/date.util';

export enum TransactionType {
  BUY = 'buy',
  SELL = 'sell',
  DEPOSIT = 'deposit',
  WITHDRAWAL = 'withdrawal',
  DIVIDEND = 'dividend',
  SPLIT = 'split',
  CAPITAL_INCREASE = 'capital_increase',
  RIGHTS_ISSUE = 'rights_issue',
}

export enum AssetType {
  STOCK = 'stock',
  FUND = 'fund',
  CASH = 'cash',
}

// Ledger fact. Immutable once recorded; order is (date, insertion).
export interface Transaction {
  id: string;
  type: TransactionType;
  symbol?: string;            // absent for deposit / withdrawal
  quantity: Decimal;          // split: net new shares, not a ratio
  price?: Decimal;            // native currency; dividend: total cash amount
  date: IsoDate;
  currency: string;
  assetType: AssetType;
  note?: string;
  createdAt?: Date;
}

/** Ordered, read-only view handed to the engine. */
export type Ledger = readonly Transaction[];

// Types that add shares without a purchase price
export const ZERO_COST_SHARE_TYPES: ReadonlySet<TransactionType> = new Set([
  TransactionType.SPLIT,
  TransactionType.CAPITAL_INCREASE,
]);

// Types that add shares at a cash price
export const PURCHASE_TYPES: ReadonlySet<TransactionType> = new Set([
  TransactionType.BUY,
  TransactionType.RIGHTS_ISSUE,
]);

/**
 * Stable sort by calendar date. Transactions sharing a date keep their
 * relative (insertion) order.
 */
export function orderLedger(ledger: Ledger): Transaction[] {
  return ledger
    .map((tx, index) => ({ tx, index }))
    .sort((a, b) => (a.tx.date === b.tx.date ? a.index - b.index : a.tx.date < b.tx.date ? -1 : 1))
    .map(({ tx }) => tx);
}
