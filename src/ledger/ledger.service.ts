import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { CLOCK, Clock } from '../common/clock/clock';
import { engineConfig } from '../config/engine.config';
import { isAnalysisError } from '../common/interfaces/analysis-result.interface';
import { toDecimal, toNumber } from '../common/utils/decimal.util';
import { isIsoDate } from '../common/utils/date.util';
import { CorporateActionService } from '../corporate-actions/corporate-action.service';
import { LedgerFilter, LedgerStorageService } from './ledger-storage.service';
import { AssetType, Ledger, PURCHASE_TYPES, Transaction, TransactionType } from './entities/transaction.entity';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { ApplyCorporateEventDto } from './dto/apply-corporate-event.dto';
import { TransactionResponseDto } from './dto/transaction-response.dto';

const CASH_TYPES: ReadonlySet<TransactionType> = new Set([TransactionType.DEPOSIT, TransactionType.WITHDRAWAL]);

// Types whose quantity counts shares (or cash) and must be positive
const POSITIVE_QUANTITY_TYPES: ReadonlySet<TransactionType> = new Set([
  TransactionType.BUY,
  TransactionType.SELL,
  TransactionType.DEPOSIT,
  TransactionType.WITHDRAWAL,
  TransactionType.SPLIT,
  TransactionType.CAPITAL_INCREASE,
  TransactionType.RIGHTS_ISSUE,
]);

export interface RecordResult {
  transaction: Transaction;
  duplicate: boolean;
}

// Ledger writes. Append-only; the engine reads snapshots through getLedger().
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    private readonly storage: LedgerStorageService,
    private readonly corporateActions: CorporateActionService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  /**
   * Validates and appends a transaction.
   * Idempotent - a known id returns the existing record untouched.
   * @throws BadRequestException when the transaction breaks a ledger invariant
   */
  record(dto: CreateTransactionDto): RecordResult {
    if (dto.id !== undefined) {
      const existing = this.storage.findById(dto.id);
      if (existing) {
        return { transaction: existing, duplicate: true };
      }
    }

    this.assertValid(dto);

    const transaction: Transaction = {
      id: dto.id ?? uuidv4(),
      type: dto.type,
      symbol: dto.symbol,
      quantity: toDecimal(dto.quantity),
      price: dto.price === undefined ? undefined : toDecimal(dto.price),
      date: dto.date,
      currency: dto.currency ?? this.config.baseCurrency,
      assetType: dto.assetType ?? (CASH_TYPES.has(dto.type) ? AssetType.CASH : AssetType.STOCK),
      note: dto.note,
      createdAt: this.clock.now(),
    };

    this.storage.append(transaction);
    return { transaction, duplicate: false };
  }

  /**
   * Converts a percentage dividend or bonus issue into a ledger entry using
   * the shares held before the event date.
   * @throws NotFoundException when no shares are held before the date
   */
  applyCorporateEvent(dto: ApplyCorporateEventDto): Transaction {
    if (!isIsoDate(dto.date)) {
      throw new BadRequestException(`Invalid date: ${dto.date}`);
    }
    const ledger = this.storage.getLedger({ symbol: dto.symbol });
    const draft =
      dto.type === 'dividend'
        ? this.corporateActions.resolveDividend(ledger, dto.symbol, dto.date, dto.percentage)
        : this.corporateActions.resolveBonusIssue(ledger, dto.symbol, dto.date, dto.percentage);

    if (isAnalysisError(draft)) {
      throw new NotFoundException(draft.error);
    }

    this.logger.log(`${dto.type} of ${dto.percentage}% on ${dto.symbol}: ${draft.sharesHeld} shares held`);
    return this.record({
      type: draft.type,
      symbol: draft.symbol,
      quantity: draft.quantity,
      price: draft.price,
      date: draft.date,
      assetType: draft.assetType,
      note: draft.note,
    }).transaction;
  }

  getLedger(filter: LedgerFilter = {}): Ledger {
    return this.storage.getLedger(filter);
  }

  findById(id: string): Transaction | undefined {
    return this.storage.findById(id);
  }

  /** Clears all state - test harness only */
  clearAll(): void {
    this.storage.clearAllData();
  }

  private assertValid(dto: CreateTransactionDto): void {
    if (!isIsoDate(dto.date)) {
      throw new BadRequestException(`Invalid date: ${dto.date}`);
    }
    if (CASH_TYPES.has(dto.type)) {
      if (dto.symbol !== undefined) {
        throw new BadRequestException(`${dto.type} must not carry a symbol`);
      }
    } else if (!dto.symbol) {
      throw new BadRequestException(`${dto.type} requires a symbol`);
    }
    if (POSITIVE_QUANTITY_TYPES.has(dto.type) && !(dto.quantity > 0)) {
      throw new BadRequestException(`${dto.type} requires a positive quantity`);
    }
    if (PURCHASE_TYPES.has(dto.type) && !(dto.price !== undefined && dto.price > 0)) {
      throw new BadRequestException(`${dto.type} requires a positive price`);
    }
  }
}

export function toTransactionResponse(transaction: Transaction): TransactionResponseDto {
  return {
    id: transaction.id,
    type: transaction.type,
    symbol: transaction.symbol ?? null,
    quantity: toNumber(transaction.quantity),
    price: transaction.price === undefined ? null : toNumber(transaction.price),
    date: transaction.date,
    currency: transaction.currency,
    assetType: transaction.assetType,
    note: transaction.note ?? null,
    createdAt: transaction.createdAt?.toISOString() ?? null,
  };
}
