import { Module } from '@nestjs/common';
import { MarketDataService } from './market-data.service';
import { MarketDataController } from './market-data.controller';
import { StaticSectorInfoProvider } from './static-sector-info.provider';
import {
  FX_RATE_PROVIDER,
  PRICE_SERIES_PROVIDER,
  SECTOR_INFO_PROVIDER,
} from './interfaces/market-data-provider.interface';

@Module({
  controllers: [MarketDataController],
  providers: [
    MarketDataService,
    StaticSectorInfoProvider,
    { provide: PRICE_SERIES_PROVIDER, useExisting: MarketDataService },
    { provide: FX_RATE_PROVIDER, useExisting: MarketDataService },
    { provide: SECTOR_INFO_PROVIDER, useExisting: StaticSectorInfoProvider },
  ],
  exports: [MarketDataService, PRICE_SERIES_PROVIDER, FX_RATE_PROVIDER, SECTOR_INFO_PROVIDER],
})
export class MarketDataModule {}
