import { Module } from '@nestjs/common';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { CostBasisService } from '../cost-basis/cost-basis.service';
import { CorporateActionService } from '../corporate-actions/corporate-action.service';
import { ValuationService } from '../valuation/valuation.service';
import { RiskMetricsService } from '../risk/risk-metrics.service';
import { PerformanceService } from '../risk/performance.service';
import { ScoringService } from '../scoring/scoring.service';

// Pure computation over ledger snapshots and price series. No storage, no I/O.
@Module({
  providers: [
    LedgerReplayService,
    CostBasisService,
    CorporateActionService,
    ValuationService,
    RiskMetricsService,
    PerformanceService,
    ScoringService,
  ],
  exports: [
    LedgerReplayService,
    CostBasisService,
    CorporateActionService,
    ValuationService,
    RiskMetricsService,
    PerformanceService,
    ScoringService,
  ],
})
export class EngineModule {}
