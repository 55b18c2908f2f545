import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { CorporateActionService, KNOWN_STOCK_SPLITS } from './corporate-action.service';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { closeOnlyBar, PriceBar, PriceSeries } from '../market-data/price-series';
import { AssetType, Transaction, TransactionType } from '../ledger/entities/transaction.entity';
import { isAnalysisError } from '../common/interfaces/analysis-result.interface';

describe('CorporateActionService', () => {
  let service: CorporateActionService;

  const bar = (date: string, close: number, volume: number): PriceBar => ({
    date,
    open: close,
    high: close + 2,
    low: close - 2,
    close,
    volume,
  });

  const buy = (quantity: number, date: string): Transaction => ({
    id: `buy-${date}`,
    type: TransactionType.BUY,
    symbol: 'SISE',
    quantity: new Decimal(quantity),
    price: new Decimal(40),
    date,
    currency: 'TRY',
    assetType: AssetType.STOCK,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [LedgerReplayService, CorporateActionService],
    }).compile();

    service = module.get<CorporateActionService>(CorporateActionService);
  });

  describe('adjustForSplit', () => {
    it('should divide prices and multiply volume strictly before the split date', () => {
      const series = new PriceSeries({
        SISE: [bar('2023-12-29', 100, 1000), bar('2024-01-01', 50, 2000), bar('2024-01-02', 52, 1500)],
      });

      const adjusted = service.adjustForSplit(series, 'SISE', '2024-01-01', 2);

      expect(adjusted.bars('SISE')).toEqual([
        { date: '2023-12-29', open: 50, high: 51, low: 49, close: 50, volume: 2000 },
        bar('2024-01-01', 50, 2000),
        bar('2024-01-02', 52, 1500),
      ]);
    });

    it('should leave the input series untouched', () => {
      const series = new PriceSeries({ SISE: [bar('2023-12-29', 100, 1000)] });

      service.adjustForSplit(series, 'SISE', '2024-01-01', 2);

      expect(series.asof('SISE', '2023-12-29')).toBe(100);
    });

    it('should ignore non-positive ratios and unknown symbols', () => {
      const series = new PriceSeries({ SISE: [bar('2023-12-29', 100, 1000)] });

      expect(service.adjustForSplit(series, 'SISE', '2024-01-01', 0)).toBe(series);
      expect(service.adjustForSplit(series, 'THYAO', '2024-01-01', 2)).toBe(series);
    });
  });

  describe('applyKnownSplits', () => {
    it('should ship the CCOLA split', () => {
      expect(KNOWN_STOCK_SPLITS.CCOLA).toEqual({ date: '2024-08-01', ratio: 11 });
    });

    it('should rescale history before each declared split', () => {
      const series = new PriceSeries({
        CCOLA: [closeOnlyBar('2024-07-31', 550), closeOnlyBar('2024-08-01', 51)],
        SISE: [closeOnlyBar('2024-07-31', 45)],
      });

      const adjusted = service.applyKnownSplits(series);

      expect(adjusted.closes('CCOLA')).toEqual([50, 51]);
      expect(adjusted.closes('SISE')).toEqual([45]);
    });
  });

  describe('ratioFromPercentage', () => {
    it.each([
      [100, 2],
      [50, 1.5],
      [0, 1],
    ])('should turn %p%% into a ratio of %p', (percentage, ratio) => {
      expect(service.ratioFromPercentage(percentage)).toBe(ratio);
    });
  });

  describe('resolveDividend', () => {
    it('should compute the cash amount from shares held before the date', () => {
      const ledger = [buy(200, '2024-01-10'), buy(100, '2024-05-01')];

      const draft = service.resolveDividend(ledger, 'SISE', '2024-05-01', 25);

      expect(draft).toEqual({
        type: TransactionType.DIVIDEND,
        symbol: 'SISE',
        date: '2024-05-01',
        quantity: 0,
        price: 50,
        assetType: AssetType.STOCK,
        note: 'Dividend (25%)',
        sharesHeld: 200,
      });
    });

    it('should report no_shares_held when nothing is held', () => {
      const draft = service.resolveDividend([buy(200, '2024-05-01')], 'SISE', '2024-05-01', 25);

      expect(isAnalysisError(draft)).toBe(true);
      expect(draft).toEqual({
        reason: 'no_shares_held',
        error: 'No shares of SISE held on 2024-05-01 to apply the event to.',
      });
    });
  });

  describe('resolveBonusIssue', () => {
    it('should record the new shares as a split', () => {
      const draft = service.resolveBonusIssue([buy(200, '2024-01-10')], 'SISE', '2024-06-01', 50);

      expect(draft).toEqual({
        type: TransactionType.SPLIT,
        symbol: 'SISE',
        date: '2024-06-01',
        quantity: 100,
        price: 0,
        assetType: AssetType.STOCK,
        note: 'Stock Split (1.5-for-1)',
        sharesHeld: 200,
      });
    });

    it('should report no_shares_held before the first purchase', () => {
      const draft = service.resolveBonusIssue([buy(200, '2024-01-10')], 'SISE', '2024-01-01', 50);

      expect(isAnalysisError(draft) && draft.reason).toBe('no_shares_held');
    });
  });
});
