import { IsDateString, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { ISO_DATE_MESSAGE, ISO_DATE_RE } from '../../common/utils/date.util';

// Filters for reading the ledger; both date bounds are inclusive
export class LedgerQueryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  symbol?: string;

  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  from?: string;

  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  to?: string;
}
