import Decimal from 'decimal.js';
import { IsoDate } from '../../common/utils/date.util';

// FIFO lot - shares acquired together at one unit cost.
// Ephemeral: rebuilt from the ledger on every query.
export interface Lot {
  symbol: string;
  quantity: Decimal;
  unitCost: Decimal;          // zero for split / bonus shares
  acquisitionDate: IsoDate;
  transactionId: string;
}
