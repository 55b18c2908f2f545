import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { LedgerService, toTransactionResponse } from './ledger.service';
import { LedgerStorageService } from './ledger-storage.service';
import { LedgerReplayService } from './ledger-replay.service';
import { CorporateActionService } from '../corporate-actions/corporate-action.service';
import { CLOCK } from '../common/clock/clock';
import { DEFAULT_ENGINE_CONFIG, engineConfig } from '../config/engine.config';
import { AssetType, TransactionType } from './entities/transaction.entity';
import { CreateTransactionDto } from './dto/create-transaction.dto';

describe('LedgerService', () => {
  let service: LedgerService;
  const now = new Date('2024-06-03T12:00:00Z');

  const buyDto = (overrides: Partial<CreateTransactionDto> = {}): CreateTransactionDto => ({
    type: TransactionType.BUY,
    symbol: 'THYAO',
    quantity: 100,
    price: 250,
    date: '2024-01-05',
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerStorageService,
        LedgerReplayService,
        CorporateActionService,
        LedgerService,
        { provide: CLOCK, useValue: { now: () => now } },
        { provide: engineConfig.KEY, useValue: DEFAULT_ENGINE_CONFIG },
      ],
    }).compile();

    service = module.get<LedgerService>(LedgerService);
  });

  afterEach(() => {
    service.clearAll();
  });

  describe('record', () => {
    it('should fill in id, currency, asset type and timestamp', () => {
      const { transaction, duplicate } = service.record(buyDto());

      expect(duplicate).toBe(false);
      expect(transaction.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(transaction.currency).toBe('TRY');
      expect(transaction.assetType).toBe(AssetType.STOCK);
      expect(transaction.createdAt).toEqual(now);
      expect(transaction.quantity.toNumber()).toBe(100);
    });

    it('should mark deposits and withdrawals as cash', () => {
      const { transaction } = service.record({ type: TransactionType.DEPOSIT, quantity: 10000, date: '2024-01-01' });

      expect(transaction.assetType).toBe(AssetType.CASH);
      expect(transaction.price).toBeUndefined();
    });

    it('should return the existing record for a known id', () => {
      const first = service.record(buyDto({ id: 'tx-1' }));
      const second = service.record(buyDto({ id: 'tx-1', quantity: 999 }));

      expect(second.duplicate).toBe(true);
      expect(second.transaction).toBe(first.transaction);
      expect(service.getLedger()).toHaveLength(1);
    });

    it.each([
      [{ date: '2024-02-30' }, 'Invalid date: 2024-02-30'],
      [{ symbol: undefined }, 'buy requires a symbol'],
      [{ quantity: 0 }, 'buy requires a positive quantity'],
      [{ price: undefined }, 'buy requires a positive price'],
      [{ type: TransactionType.RIGHTS_ISSUE, price: 0 }, 'rights_issue requires a positive price'],
      [{ type: TransactionType.DEPOSIT }, 'deposit must not carry a symbol'],
    ])('should reject %p', (overrides, message) => {
      expect(() => service.record(buyDto(overrides))).toThrow(new BadRequestException(message));
    });

    it('should accept a sell without a price', () => {
      const { transaction } = service.record(buyDto({ type: TransactionType.SELL, price: undefined }));

      expect(transaction.price).toBeUndefined();
    });

    it('should accept a dividend with zero quantity', () => {
      const { transaction } = service.record(buyDto({ type: TransactionType.DIVIDEND, quantity: 0, price: 80 }));

      expect(transaction.type).toBe(TransactionType.DIVIDEND);
    });
  });

  describe('getLedger', () => {
    it('should return transactions in date order with filters applied', () => {
      service.record(buyDto({ id: 'b', date: '2024-03-01' }));
      service.record(buyDto({ id: 'a', date: '2024-01-01' }));
      service.record(buyDto({ id: 'c', symbol: 'SISE', date: '2024-02-01' }));

      expect(service.getLedger().map((tx) => tx.id)).toEqual(['a', 'c', 'b']);
      expect(service.getLedger({ symbol: 'THYAO' }).map((tx) => tx.id)).toEqual(['a', 'b']);
      expect(service.getLedger({ from: '2024-02-01', to: '2024-02-29' }).map((tx) => tx.id)).toEqual(['c']);
    });
  });

  describe('applyCorporateEvent', () => {
    beforeEach(() => {
      service.record(buyDto({ quantity: 200, date: '2024-01-10' }));
    });

    it('should record a dividend from shares held before the date', () => {
      const transaction = service.applyCorporateEvent({
        type: 'dividend',
        symbol: 'THYAO',
        date: '2024-05-01',
        percentage: 25,
      });

      expect(toTransactionResponse(transaction)).toEqual({
        id: transaction.id,
        type: TransactionType.DIVIDEND,
        symbol: 'THYAO',
        quantity: 0,
        price: 50,
        date: '2024-05-01',
        currency: 'TRY',
        assetType: AssetType.STOCK,
        note: 'Dividend (25%)',
        createdAt: '2024-06-03T12:00:00.000Z',
      });
    });

    it('should record a bonus issue as a split of new shares', () => {
      const transaction = service.applyCorporateEvent({
        type: 'bonus_issue',
        symbol: 'THYAO',
        date: '2024-06-01',
        percentage: 100,
      });

      expect(transaction.type).toBe(TransactionType.SPLIT);
      expect(transaction.quantity.toNumber()).toBe(200);
      expect(transaction.note).toBe('Stock Split (2-for-1)');
    });

    it('should throw NotFoundException when nothing is held', () => {
      expect(() =>
        service.applyCorporateEvent({ type: 'dividend', symbol: 'SISE', date: '2024-05-01', percentage: 10 }),
      ).toThrow(NotFoundException);
    });

    it('should reject an invalid date', () => {
      expect(() =>
        service.applyCorporateEvent({ type: 'dividend', symbol: 'THYAO', date: '2024-13-01', percentage: 10 }),
      ).toThrow('Invalid date: 2024-13-01');
    });
  });
});
