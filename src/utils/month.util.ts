const MONTH_PATTERN = /^(\d{4})-(\d{2})(?:-01)?$/;

const partsFormatters = new Map<string, Intl.DateTimeFormat>();

function partsFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = partsFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    partsFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Calendar date (`YYYY-MM-DD`) of an instant as seen in `timeZone`.
 */
export function dateInZone(instant: Date, timeZone: string): string {
  const parts = partsFormatter(timeZone).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((part) => part.type === type)?.value ?? '';
  return `${pick('year')}-${pick('month')}-${pick('day')}`;
}

const dateTimeFormatters = new Map<string, Intl.DateTimeFormat>();

/**
 * `YYYY-MM-DD HH:mm:ss` wall-clock time of an instant in `timeZone`.
 */
export function dateTimeInZone(instant: Date, timeZone: string): string {
  let formatter = dateTimeFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    dateTimeFormatters.set(timeZone, formatter);
  }
  const parts = formatter.formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((part) => part.type === type)?.value ?? '';
  return `${pick('year')}-${pick('month')}-${pick('day')} ${pick('hour')}:${pick('minute')}:${pick('second')}`;
}

/**
 * Calendar arithmetic on a `YYYY-MM-DD` date.
 */
export function shiftDate(date: string, days: number): string {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

/**
 * True for a real calendar date written as `YYYY-MM-DD`.
 */
export function isCalendarDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && shiftDate(value, 0) === value;
}

/**
 * First-of-month key (`YYYY-MM-01`) for an instant in `timeZone`.
 */
export function monthOf(instant: Date, timeZone: string): string {
  return `${dateInZone(instant, timeZone).slice(0, 7)}-01`;
}

/**
 * Accepts `YYYY-MM` or `YYYY-MM-01` and returns `YYYY-MM-01`, or null when it is not a month.
 */
export function normalizeMonth(value: string): string | null {
  const match = MONTH_PATTERN.exec(value.trim());
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return `${match[1]}-${match[2]}-01`;
}

/**
 * Localized tab title for a month key: `2024-03-01` → `2024年3月` under ja-JP.
 */
export function monthTabName(month: string, locale: string = 'ja-JP'): string {
  const normalized = normalizeMonth(month);
  if (!normalized) {
    throw new Error(`Invalid month: ${month}`);
  }
  const [year, monthNumber] = normalized.split('-').map(Number);
  // Noon UTC keeps the calendar month stable whatever zone the formatter runs in
  const anchor = new Date(Date.UTC(year, monthNumber - 1, 1, 12));
  return new Intl.DateTimeFormat(locale, { year: 'numeric', month: 'long', timeZone: 'UTC' }).format(anchor);
}
