// Current position for a single symbol
export class PositionDto {
  symbol!: string;
  quantity!: number;
  costBasis!: number;              // FIFO cost of the held quantity
  averageCost!: number;            // costBasis / quantity
  currentPrice!: number | null;    // latest close on or before today
  currentValue!: number | null;    // quantity * current price
  unrealizedPnl!: number | null;
  unrealizedPnlPercent!: number | null;
}

// Complete portfolio snapshot
export class PortfolioResponseDto {
  asOf!: string;
  positions!: PositionDto[];
  totalCost!: number;
  totalValue!: number;             // sum of priced position values
  totalUnrealizedPnl!: number;     // sum of priced unrealized PnL
  quoteCurrency!: string;
  totalValueInQuote!: number | null;  // null without a positive FX rate
}

export class CashResponseDto {
  date!: string;
  currency!: string;
  balance!: number;
}
