import { InvalidDateError } from '../errors/market-data.errors';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface EpochRange {
  start: number;
  end: number;
}

/**
 * Parse a YYYY-MM-DD string as midnight UTC of that day
 */
export function parseCalendarDate(value: string): Date {
  const match = CALENDAR_DATE.exec(value.trim());
  if (!match) {
    throw new InvalidDateError(value);
  }

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);

  // 2024-02-30 rolls over into March
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    throw new InvalidDateError(value, 'no such day');
  }
  return date;
}

/**
 * Inclusive day range as millisecond epoch bounds:
 * start of `startDate` to the last millisecond of `endDate`, both UTC.
 */
export function toEpochRange(startDate: string, endDate: string): EpochRange {
  const start = parseCalendarDate(startDate).getTime();
  const end = parseCalendarDate(endDate).getTime() + DAY_MS - 1;

  if (end < start) {
    throw new InvalidDateError(endDate, `end date precedes start date ${startDate}`);
  }
  return { start, end };
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}
