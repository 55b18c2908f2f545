import { Injectable } from '@nestjs/common';
import { Ledger, orderLedger, Transaction } from './entities/transaction.entity';
import { IsoDate } from '../common/utils/date.util';

export interface LedgerFilter {
  symbol?: string;
  from?: IsoDate;   // inclusive
  to?: IsoDate;     // inclusive
}

// Append-only in-memory ledger.
// Transaction deduplication via id index; reads come back date-ordered.
@Injectable()
export class LedgerStorageService {
  private transactions: Transaction[] = [];
  private idIndex: Map<string, Transaction> = new Map();

  /** Appends a transaction and indexes it by id for idempotency */
  append(transaction: Transaction): Transaction {
    this.transactions.push(transaction);
    this.idIndex.set(transaction.id, transaction);
    return transaction;
  }

  /** O(1) lookup by transaction id */
  findById(id: string): Transaction | undefined {
    return this.idIndex.get(id);
  }

  /**
   * Date-ordered snapshot, ties in insertion order.
   * Returns a fresh array; callers cannot mutate the store through it.
   */
  getLedger(filter: LedgerFilter = {}): Ledger {
    const { symbol, from, to } = filter;
    return orderLedger(this.transactions).filter(
      (tx) =>
        (symbol === undefined || tx.symbol === symbol) &&
        (from === undefined || tx.date >= from) &&
        (to === undefined || tx.date <= to),
    );
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.transactions = [];
    this.idIndex.clear();
  }
}
