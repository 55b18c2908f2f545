import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { PortfolioController } from './portfolio.controller';
import { PortfolioQueryService } from './portfolio-query.service';
import { AnalyticsService } from './analytics.service';
import { LedgerModule } from '../ledger/ledger.module';
import { EngineModule } from '../engine/engine.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { CLOCK, Clock } from '../common/clock/clock';
import { DASHBOARD_CACHE, SECTOR_CACHE, TtlCache } from '../common/cache/ttl-cache';
import { engineConfig } from '../config/engine.config';

@Module({
  imports: [LedgerModule, EngineModule, MarketDataModule],
  controllers: [PortfolioController],
  providers: [
    PortfolioQueryService, // Queries: positions, pnl, cash, timeline
    AnalyticsService,      // Risk bundles, dashboard, sectors
    {
      provide: DASHBOARD_CACHE,
      useFactory: (clock: Clock, config: ConfigType<typeof engineConfig>) =>
        new TtlCache(clock, config.dashboardCacheTtlMs),
      inject: [CLOCK, engineConfig.KEY],
    },
    {
      // sector metadata does not change; successful lookups live for the process
      provide: SECTOR_CACHE,
      useFactory: (clock: Clock) => new TtlCache(clock, null),
      inject: [CLOCK],
    },
  ],
})
export class PortfolioModule {}
