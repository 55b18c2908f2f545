// Realized gains/losses from sells matched against FIFO lots
export class RealizedPnlDto {
  symbol!: string;
  realizedPnl!: number;
  closedQuantity!: number;         // quantity sold against lots
}

// Unrealized gains/losses from open positions
export class UnrealizedPnlDto {
  symbol!: string;
  unrealizedPnl!: number;          // paper profit/loss
  currentQuantity!: number;
  averageCost!: number;
  currentPrice!: number;
}

// Complete PnL breakdown
export class PnlResponseDto {
  realizedPnl!: RealizedPnlDto[];
  unrealizedPnl!: UnrealizedPnlDto[];
  totalRealizedPnl!: number;
  totalUnrealizedPnl!: number;
  netPnl!: number;                 // realized + unrealized
}
