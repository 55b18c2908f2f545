import { AssetType, TransactionType } from '../entities/transaction.entity';

// Transaction as returned over HTTP: decimals become numbers
export class TransactionResponseDto {
  id!: string;
  type!: TransactionType;
  symbol!: string | null;
  quantity!: number;
  price!: number | null;
  date!: string;
  currency!: string;
  assetType!: AssetType;
  note!: string | null;
  createdAt!: string | null;
}

export class RecordTransactionResponseDto extends TransactionResponseDto {
  message!: string;
  duplicate!: boolean;             // true if the id was already recorded
}
