import { describe, it, expect } from 'vitest';

import { addDays, formatYmd, isValidYmd, maxYmd, parseYmd, splitIntoWindows, todayYmd } from '../dates';

describe('YYYYMMDD dates', () => {
  it('validates real calendar days only', () => {
    expect(isValidYmd('20250501')).toBe(true);
    expect(isValidYmd('20240229')).toBe(true);
    expect(isValidYmd('20250229')).toBe(false);
    expect(isValidYmd('2025-05-01')).toBe(false);
    expect(isValidYmd('20251301')).toBe(false);
  });

  it('throws a ValidationError naming the field', () => {
    expect(() => parseYmd('20250230', 'dataFinal')).toThrow('dataFinal must be a valid YYYYMMDD date');
  });

  it('adds days across month and year boundaries', () => {
    expect(addDays('20250531', 1)).toBe('20250601');
    expect(addDays('20241231', 1)).toBe('20250101');
    expect(addDays('20250301', -1)).toBe('20250228');
  });

  it('formats in UTC', () => {
    expect(formatYmd(new Date('2025-05-01T00:00:00Z'))).toBe('20250501');
  });

  it('picks the later date', () => {
    expect(maxYmd('20250501', '20250430')).toBe('20250501');
    expect(maxYmd('20250430', '20250501')).toBe('20250501');
  });

  it('computes today in Brasília', () => {
    expect(todayYmd(new Date('2025-05-02T02:00:00Z'))).toBe('20250501');
    expect(todayYmd(new Date('2025-05-02T03:00:00Z'))).toBe('20250502');
  });
});

describe('splitIntoWindows', () => {
  it('returns a single window for short ranges', () => {
    expect(splitIntoWindows('20250501', '20250601', 365)).toEqual([
      { dataInicial: '20250501', dataFinal: '20250601' },
    ]);
  });

  it('splits long ranges into consecutive windows of at most maxDays', () => {
    expect(splitIntoWindows('20230101', '20250101', 365)).toEqual([
      { dataInicial: '20230101', dataFinal: '20231231' },
      { dataInicial: '20240101', dataFinal: '20241230' },
      { dataInicial: '20241231', dataFinal: '20250101' },
    ]);
  });

  it('returns no windows when the range is empty', () => {
    expect(splitIntoWindows('20250602', '20250601', 365)).toEqual([]);
  });
});
