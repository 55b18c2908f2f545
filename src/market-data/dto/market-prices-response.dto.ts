// Latest close for every tracked symbol
export class MarketPricesResponseDto {
  prices!: Record<string, number>;  // { "THYAO": 120, "EURTRY=X": 35.2 }
  lastUpdated!: string;             // ISO timestamp
  source!: string;                  // "manual" or a vendor name
}
