import { IsDateString, IsIn, IsNotEmpty, IsNumber, IsPositive, IsString, Matches } from 'class-validator';
import { ISO_DATE_MESSAGE, ISO_DATE_RE } from '../../common/utils/date.util';

export const CORPORATE_EVENT_TYPES = ['dividend', 'bonus_issue'] as const;
export type CorporateEventType = (typeof CORPORATE_EVENT_TYPES)[number];

// Percentage-declared event, e.g. "THYAO dividend 25%" or "SISE bonus issue 100%"
export class ApplyCorporateEventDto {
  @IsIn(CORPORATE_EVENT_TYPES)
  type!: CorporateEventType;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  date!: string;

  @IsNumber()
  @IsPositive()
  percentage!: number;
}
