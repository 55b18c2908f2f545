import Decimal from 'decimal.js';
import { IsoDate } from '../../common/utils/date.util';

// Realized P&L from one sell consuming (part of) one lot.
export interface RealizedPnlRecord {
  symbol: string;
  quantity: Decimal;
  buyPrice: Decimal;      // lot unit cost
  sellPrice: Decimal;
  pnl: Decimal;           // (sellPrice - buyPrice) × quantity
  date: IsoDate;
}

export type RealizedPnlAggregate = {
  totalPnl: Decimal;
  totalQuantity: Decimal;
};
