import { IsoDate } from '../../common/utils/date.util';

export interface CostBasis {
  totalCost: number;
  averageUnitCost: number;
}

// Investor's own performance on a currently held symbol.
export interface UserPerformance {
  symbol: string;
  quantity: number;
  costBasis: number;
  currentValue: number;
  averagePurchasePrice: number;
  currentPrice: number;
  returnAmount: number;
  returnPercentage: number;
  firstPurchaseDate: IsoDate | null;
  daysHeld: number;
  annualizedReturn: number;
}
