import { IsDateString, IsIn, IsOptional, Matches } from 'class-validator';
import { ISO_DATE_MESSAGE, ISO_DATE_RE } from '../../common/utils/date.util';
import { ReturnSource } from '../../risk/entities/risk-profile.entity';

export class TimelineQueryDto {
  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  start?: string;

  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  end?: string;
}

export const RISK_PERIODS = ['3mo', '6mo', '1y', '2y'] as const;
export type RiskPeriod = (typeof RISK_PERIODS)[number];

export class RiskQueryDto {
  @IsOptional()
  @IsIn(RISK_PERIODS)
  period?: RiskPeriod;

  // user: first return measured from average cost; market: day over day only
  @IsOptional()
  @IsIn(['user', 'market'])
  returns?: ReturnSource;
}

export class CashQueryDto {
  @IsOptional()
  @Matches(ISO_DATE_RE, { message: ISO_DATE_MESSAGE })
  @IsDateString({ strict: true })
  date?: string;
}
