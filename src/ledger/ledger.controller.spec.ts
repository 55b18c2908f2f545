import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { LedgerStorageService } from './ledger-storage.service';
import { LedgerReplayService } from './ledger-replay.service';
import { CorporateActionService } from '../corporate-actions/corporate-action.service';
import { CLOCK } from '../common/clock/clock';
import { DEFAULT_ENGINE_CONFIG, engineConfig } from '../config/engine.config';
import { TransactionType } from './entities/transaction.entity';
import { CreateTransactionDto } from './dto/create-transaction.dto';

describe('LedgerController', () => {
  let controller: LedgerController;
  let service: LedgerService;
  let idCounter = 1;

  const createTestTransactionDto = (overrides: Partial<CreateTransactionDto> = {}): CreateTransactionDto => ({
    id: `tx-${idCounter++}`,
    type: TransactionType.BUY,
    symbol: 'THYAO',
    quantity: 10,
    price: 250,
    date: '2024-01-05',
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [LedgerController],
      providers: [
        LedgerStorageService,
        LedgerReplayService,
        CorporateActionService,
        LedgerService,
        { provide: CLOCK, useValue: { now: () => new Date('2024-06-03T12:00:00Z') } },
        { provide: engineConfig.KEY, useValue: DEFAULT_ENGINE_CONFIG },
      ],
    }).compile();

    controller = module.get<LedgerController>(LedgerController);
    service = module.get<LedgerService>(LedgerService);
    idCounter = 1;
  });

  afterEach(() => {
    service.clearAll();
  });

  describe('record', () => {
    it('should create a transaction and return proper response', () => {
      const result = controller.record(createTestTransactionDto({ note: 'opening position' }));

      expect(result).toEqual({
        id: 'tx-1',
        type: TransactionType.BUY,
        symbol: 'THYAO',
        quantity: 10,
        price: 250,
        date: '2024-01-05',
        currency: 'TRY',
        assetType: 'stock',
        note: 'opening position',
        createdAt: '2024-06-03T12:00:00.000Z',
        message: 'Transaction recorded successfully',
        duplicate: false,
      });
    });

    it('should return existing transaction for duplicate id', () => {
      const dto = createTestTransactionDto({ id: 'fixed-id' });

      const first = controller.record(dto);
      const second = controller.record(dto);

      expect(second.id).toBe(first.id);
      expect(second.duplicate).toBe(true);
      expect(second.message).toBe('Transaction already recorded (idempotent)');
    });

    it('should render cash transactions without symbol or price', () => {
      const result = controller.record(
        createTestTransactionDto({ type: TransactionType.DEPOSIT, symbol: undefined, price: undefined, quantity: 5000 }),
      );

      expect(result.symbol).toBeNull();
      expect(result.price).toBeNull();
      expect(result.assetType).toBe('cash');
    });
  });

  describe('list', () => {
    it('should filter by symbol and date range', () => {
      controller.record(createTestTransactionDto({ date: '2024-01-05' }));
      controller.record(createTestTransactionDto({ symbol: 'SISE', date: '2024-02-05' }));
      controller.record(createTestTransactionDto({ type: TransactionType.SELL, quantity: 4, date: '2024-03-05' }));

      expect(controller.list({ symbol: 'THYAO' }).map((tx) => tx.id)).toEqual(['tx-1', 'tx-3']);
      expect(controller.list({ from: '2024-02-01', to: '2024-02-28' }).map((tx) => tx.id)).toEqual(['tx-2']);
    });
  });

  describe('applyEvent', () => {
    it('should record a dividend against held shares', () => {
      controller.record(createTestTransactionDto({ quantity: 200 }));

      const result = controller.applyEvent({ type: 'dividend', symbol: 'THYAO', date: '2024-05-01', percentage: 10 });

      expect(result).toMatchObject({ type: TransactionType.DIVIDEND, quantity: 0, price: 20, note: 'Dividend (10%)' });
    });

    it('should return 404 when no shares are held', () => {
      expect(() => controller.applyEvent({ type: 'bonus_issue', symbol: 'THYAO', date: '2024-05-01', percentage: 50 })).toThrow(
        NotFoundException,
      );
    });
  });
});
