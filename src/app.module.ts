import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { engineConfig } from './config/engine.config';
import { validateEnv } from './config/env.validation';
import { LedgerModule } from './ledger/ledger.module';
import { MarketDataModule } from './market-data/market-data.module';
import { PortfolioModule } from './portfolio/portfolio.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv, load: [engineConfig] }),
    CommonModule,
    LedgerModule,
    MarketDataModule,
    PortfolioModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
