import { addDays, differenceInCalendarDays, eachDayOfInterval, format, isValid, parseISO, subDays } from 'date-fns';

/** Calendar date in `YYYY-MM-DD` form. Lexicographic order equals chronological order. */
export type IsoDate = string;

export const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
export const ISO_DATE_MESSAGE = '$property must be a calendar date in YYYY-MM-DD form';

export function isIsoDate(value: string): value is IsoDate {
  return ISO_DATE_RE.test(value) && isValid(parseISO(value));
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

export function shiftDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseISO(date), days));
}

export function daysAgo(date: IsoDate, days: number): IsoDate {
  return toIsoDate(subDays(parseISO(date), days));
}

export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/** Every calendar day in `[start, end]`, ascending. Empty when start > end. */
export function eachDay(start: IsoDate, end: IsoDate): IsoDate[] {
  if (start > end) {
    return [];
  }
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map(toIsoDate);
}
