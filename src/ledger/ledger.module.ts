import { Module } from '@nestjs/common';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { LedgerStorageService } from './ledger-storage.service';
import { EngineModule } from '../engine/engine.module';

@Module({
  imports: [EngineModule],
  controllers: [LedgerController],
  providers: [
    LedgerStorageService,
    LedgerService,        // Writes: record, applyCorporateEvent, clearAll
  ],
  exports: [LedgerService],
})
export class LedgerModule {}
