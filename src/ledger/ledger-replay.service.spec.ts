import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { HOLDING_EPSILON, isHeld, LedgerReplayService } from './ledger-replay.service';
import { AssetType, Transaction, TransactionType } from './entities/transaction.entity';

describe('LedgerReplayService', () => {
  let service: LedgerReplayService;
  let idCounter = 1;

  const tx = (overrides: Partial<Omit<Transaction, 'quantity' | 'price'>> & { quantity: number; price?: number }): Transaction => {
    const { quantity, price, ...rest } = overrides;
    return {
      id: `tx-${idCounter++}`,
      type: TransactionType.BUY,
      symbol: 'THYAO',
      date: '2024-01-05',
      currency: 'TRY',
      assetType: AssetType.STOCK,
      ...rest,
      quantity: new Decimal(quantity),
      price: price === undefined ? undefined : new Decimal(price),
    };
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [LedgerReplayService],
    }).compile();

    service = module.get<LedgerReplayService>(LedgerReplayService);
    idCounter = 1;
  });

  describe('holdingsAsOf', () => {
    it('should add buys and splits and subtract sells', () => {
      const ledger = [
        tx({ quantity: 100, price: 10, date: '2024-01-01' }),
        tx({ type: TransactionType.SELL, quantity: 30, price: 12, date: '2024-02-01' }),
        tx({ type: TransactionType.SPLIT, quantity: 70, price: 0, date: '2024-03-01' }),
      ];

      expect(service.holdingsAsOf(ledger, '2024-03-01')).toEqual({ THYAO: 140 });
    });

    it('should include transactions dated on the as-of date', () => {
      const ledger = [tx({ quantity: 10, price: 5, date: '2024-01-05' })];

      expect(service.holdingsAsOf(ledger, '2024-01-05')).toEqual({ THYAO: 10 });
      expect(service.holdingsAsOf(ledger, '2024-01-04')).toEqual({});
    });

    it('should let oversells go negative', () => {
      const ledger = [
        tx({ quantity: 10, price: 5, date: '2024-01-01' }),
        tx({ type: TransactionType.SELL, quantity: 15, price: 6, date: '2024-01-02' }),
      ];

      expect(service.holdingsAsOf(ledger, '2024-01-02')).toEqual({ THYAO: -5 });
    });

    it('should ignore cash-only transactions for share quantities', () => {
      const ledger = [
        tx({ type: TransactionType.DEPOSIT, symbol: undefined, quantity: 1000, date: '2024-01-01' }),
        tx({ type: TransactionType.DIVIDEND, quantity: 0, price: 50, date: '2024-01-02' }),
      ];

      expect(service.holdingsAsOf(ledger, '2024-12-31')).toEqual({});
    });

    it('should replay in date order regardless of insertion order', () => {
      const ledger = [
        tx({ type: TransactionType.SELL, quantity: 4, price: 10, date: '2024-02-01' }),
        tx({ quantity: 10, price: 8, date: '2024-01-01' }),
      ];

      expect(service.holdingsAsOf(ledger, '2024-01-15')).toEqual({ THYAO: 10 });
      expect(service.holdingsAsOf(ledger, '2024-02-01')).toEqual({ THYAO: 6 });
    });
  });

  describe('currentHoldings', () => {
    it('should exclude quantities at or below the holding epsilon', () => {
      const ledger = [
        tx({ symbol: 'AKBNK', quantity: 1, price: 10, date: '2024-01-01' }),
        tx({ symbol: 'AKBNK', type: TransactionType.SELL, quantity: 0.9995, price: 10, date: '2024-01-02' }),
        tx({ symbol: 'SISE', quantity: 1, price: 10, date: '2024-01-01' }),
        tx({ symbol: 'SISE', type: TransactionType.SELL, quantity: 0.998, price: 10, date: '2024-01-02' }),
      ];

      expect(service.currentHoldings(ledger)).toEqual({ SISE: 0.002 });
    });

    it('should leave out negative inventory', () => {
      const ledger = [tx({ type: TransactionType.SELL, quantity: 5, price: 10 })];

      expect(service.currentHoldings(ledger)).toEqual({});
    });

    it('should return symbols in alphabetical order', () => {
      const ledger = [
        tx({ symbol: 'TUPRS', quantity: 1, price: 10 }),
        tx({ symbol: 'AKBNK', quantity: 2, price: 10 }),
        tx({ symbol: 'GARAN', quantity: 3, price: 10 }),
      ];

      expect(Object.keys(service.currentHoldings(ledger))).toEqual(['AKBNK', 'GARAN', 'TUPRS']);
    });

    it('should respect an as-of date', () => {
      const ledger = [
        tx({ quantity: 10, price: 10, date: '2024-01-01' }),
        tx({ type: TransactionType.SELL, quantity: 10, price: 12, date: '2024-06-01' }),
      ];

      expect(service.currentHoldings(ledger, '2024-05-31')).toEqual({ THYAO: 10 });
      expect(service.currentHoldings(ledger)).toEqual({});
    });
  });

  describe('holdingsBefore', () => {
    it('should exclude transactions on the event date', () => {
      const ledger = [
        tx({ quantity: 100, price: 10, date: '2024-01-01' }),
        tx({ quantity: 50, price: 10, date: '2024-03-01' }),
      ];

      expect(service.holdingsBefore(ledger, 'THYAO', '2024-03-01')).toBe(100);
      expect(service.holdingsBefore(ledger, 'THYAO', '2024-03-02')).toBe(150);
    });

    it('should return 0 for a symbol never traded', () => {
      expect(service.holdingsBefore([], 'SISE', '2024-01-01')).toBe(0);
    });
  });

  describe('cashBalanceAsOf', () => {
    it('should track deposits, trades, dividends and withdrawals', () => {
      const ledger = [
        tx({ type: TransactionType.DEPOSIT, symbol: undefined, quantity: 10000, date: '2024-01-01' }),
        tx({ quantity: 50, price: 100, date: '2024-01-05' }),
        tx({ type: TransactionType.SELL, quantity: 10, price: 120, date: '2024-01-10' }),
        tx({ type: TransactionType.DIVIDEND, quantity: 0, price: 80, date: '2024-01-15' }),
        tx({ type: TransactionType.WITHDRAWAL, symbol: undefined, quantity: 500, date: '2024-01-20' }),
      ];

      expect(service.cashBalanceAsOf(ledger, '2024-01-05')).toBe(5000);
      // 10000 - 5000 + 1200 + 80 - 500
      expect(service.cashBalanceAsOf(ledger, '2024-01-20')).toBe(5780);
    });

    it('should charge rights issues like purchases and leave splits cash-neutral', () => {
      const ledger = [
        tx({ type: TransactionType.DEPOSIT, symbol: undefined, quantity: 1000, date: '2024-01-01' }),
        tx({ type: TransactionType.RIGHTS_ISSUE, quantity: 10, price: 20, date: '2024-01-02' }),
        tx({ type: TransactionType.CAPITAL_INCREASE, quantity: 10, price: 0, date: '2024-01-03' }),
      ];

      expect(service.cashBalanceAsOf(ledger, '2024-01-03')).toBe(800);
      expect(service.holdingsAsOf(ledger, '2024-01-03')).toEqual({ THYAO: 20 });
    });

    it('should credit a sell without a price as zero cash', () => {
      const ledger = [tx({ type: TransactionType.SELL, quantity: 5 })];

      expect(service.cashBalanceAsOf(ledger, '2024-12-31')).toBe(0);
    });
  });

  describe('isHeld', () => {
    it('should compare strictly against the epsilon', () => {
      expect(isHeld(HOLDING_EPSILON)).toBe(false);
      expect(isHeld(0.0011)).toBe(true);
      expect(isHeld(new Decimal('0.0005'))).toBe(false);
    });
  });
});
