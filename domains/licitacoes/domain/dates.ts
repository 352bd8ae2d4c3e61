import { ValidationError } from '@errors';

/**
* Calendar helpers for the `YYYYMMDD` dates PNCP takes as query parameters.
*
* All arithmetic is done on UTC midnight so day steps never cross a DST edge.
*/

const YMD_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

/** Brasília has had a fixed -03:00 offset since 2019 */
export const BRASILIA_OFFSET = '-03:00';
const BRASILIA_OFFSET_MS = 3 * 60 * 60 * 1000;

/** Trailing `Z` or `±hh:mm` of an ISO date-time */
export const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

export interface DateWindow {
  dataInicial: string;
  dataFinal: string;
}

/**
* Parse a `YYYYMMDD` string into a UTC Date, or null if it is not a real day
*/
export function tryParseYmd(value: string): Date | null {
  const match = YMD_PATTERN.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatYmd(date) === value ? date : null;
}

export function isValidYmd(value: string): boolean {
  return tryParseYmd(value) !== null;
}

/**
* @throws ValidationError when the value is not a real `YYYYMMDD` day
*/
export function parseYmd(value: string, field = 'date'): Date {
  const parsed = tryParseYmd(value);
  if (!parsed) {
    throw new ValidationError(`${field} must be a valid YYYYMMDD date`, { field, value });
  }
  return parsed;
}

export function formatYmd(date: Date): string {
  const y = String(date.getUTCFullYear()).padStart(4, '0');
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}${m}${d}`;
}

export function addDays(value: string, days: number): string {
  const date = parseYmd(value);
  date.setUTCDate(date.getUTCDate() + days);
  return formatYmd(date);
}

/** `YYYYMMDD` strings order lexicographically */
export function maxYmd(a: string, b: string): string {
  return a >= b ? a : b;
}

/**
* Current calendar day in Brasília
*/
export function todayYmd(now: Date = new Date()): string {
  return formatYmd(new Date(now.getTime() - BRASILIA_OFFSET_MS));
}

/**
* Split an inclusive range into consecutive windows of at most `maxDays` days
*/
export function splitIntoWindows(dataInicial: string, dataFinal: string, maxDays: number): DateWindow[] {
  if (maxDays < 1) {
    throw new ValidationError('maxDays must be >= 1', { maxDays });
  }
  parseYmd(dataInicial, 'dataInicial');
  parseYmd(dataFinal, 'dataFinal');

  const windows: DateWindow[] = [];
  let cursor = dataInicial;
  while (cursor <= dataFinal) {
    const candidateEnd = addDays(cursor, maxDays - 1);
    const end = candidateEnd < dataFinal ? candidateEnd : dataFinal;
    windows.push({ dataInicial: cursor, dataFinal: end });
    cursor = addDays(end, 1);
  }
  return windows;
}
