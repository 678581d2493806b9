/**
 * Calendar-date helpers. Every date here is a UTC midnight `Date`, so day
 * arithmetic never crosses a DST boundary and the host timezone is irrelevant.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const SHEET_DATE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

/**
 * Parse a sheet date (`YYYY/MM/DD`, month and day may be one digit).
 * Returns null for anything that is not a real calendar date.
 */
export function parseSheetDate(value: string): Date | null {
  const match = SHEET_DATE.exec(value.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;

  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC rolls Feb 30 over into March; reject instead
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function utcToday(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function isSameDay(a: Date, b: Date): boolean {
  return a.getTime() === b.getTime();
}

/** `YYYY-MM-DD` */
export function toIsoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}
