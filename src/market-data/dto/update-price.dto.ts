import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Min,
  ValidateNested,
} from 'class-validator';
import { ISO_DATE_MESSAGE, ISO_DATE_RE } from '../../common/utils/date.util';

// Close price for a single symbol, dated today unless given
export class UpdatePriceDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsNumber()
  @IsPositive()
  price!: number;

  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  date?: string;
}

// Close prices for multiple symbols on one date
export class BulkUpdatePricesDto {
  @IsObject()
  prices!: Record<string, number>;  // { "THYAO": 120, "SISE": 45.8 }

  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  date?: string;
}

export class PriceBarDto {
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  date!: string;

  @IsNumber()
  @IsPositive()
  open!: number;

  @IsNumber()
  @IsPositive()
  high!: number;

  @IsNumber()
  @IsPositive()
  low!: number;

  @IsNumber()
  @IsPositive()
  close!: number;

  @IsNumber()
  @Min(0)
  volume!: number;
}

// Daily history for one symbol (or an FX pair such as EURTRY=X)
export class RecordBarsDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => PriceBarDto)
  bars!: PriceBarDto[];
}
