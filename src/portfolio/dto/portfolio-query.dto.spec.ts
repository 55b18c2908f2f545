import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CashQueryDto, TimelineQueryDto } from './portfolio-query.dto';

describe('portfolio query DTOs', () => {
  it('should accept calendar dates', () => {
    const query = plainToInstance(TimelineQueryDto, { start: '2024-01-05', end: '2024-01-09' });

    expect(validateSync(query)).toEqual([]);
  });

  it('should reject a datetime where a calendar date is expected', () => {
    const errors = validateSync(plainToInstance(TimelineQueryDto, { start: '2024-01-05T10:00:00Z' }));

    expect(errors.map((error) => error.property)).toEqual(['start']);
    expect(errors[0].constraints).toEqual({ matches: 'start must be a calendar date in YYYY-MM-DD form' });
  });

  it.each([['2024-01-05T00:00:00'], ['20240105'], ['2024-1-5']])('should reject cash date %p', (date) => {
    const errors = validateSync(plainToInstance(CashQueryDto, { date }));

    expect(errors.map((error) => error.property)).toEqual(['date']);
  });
});
