import {
  IsDateString,
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateIf,
} from 'class-validator';
import { ISO_DATE_MESSAGE, ISO_DATE_RE } from '../../common/utils/date.util';
import { AssetType, TransactionType } from '../entities/transaction.entity';

const CASH_TYPES = [TransactionType.DEPOSIT, TransactionType.WITHDRAWAL];

// DTO for recording a ledger transaction.
// id is the idempotency key; one is generated when absent.
export class CreateTransactionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string;

  @IsEnum(TransactionType)
  type!: TransactionType;

  // required for everything except deposit / withdrawal
  @ValidateIf((dto: CreateTransactionDto) => !CASH_TYPES.includes(dto.type) || dto.symbol !== undefined)
  @IsString()
  @IsNotEmpty()
  symbol?: string;

  @IsNumber()
  @Min(0)
  quantity!: number;

  @ValidateIf((dto: CreateTransactionDto) => dto.type === TransactionType.BUY || dto.price !== undefined)
  @IsNumber()
  @Min(0)
  price?: number;

  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  date!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  currency?: string;

  @IsOptional()
  @IsEnum(AssetType)
  assetType?: AssetType;

  @IsOptional()
  @IsString()
  note?: string;
}
