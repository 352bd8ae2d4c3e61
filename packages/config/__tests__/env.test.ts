import { parseFloatEnv, parseIntArrayEnv, parseIntEnv } from '../env';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

describe('env readers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('parseIntEnv', () => {
    it('returns the default when unset or blank', () => {
      delete process.env['TEST_INT'];
      expect(parseIntEnv('TEST_INT', 7)).toBe(7);

      process.env['TEST_INT'] = '   ';
      expect(parseIntEnv('TEST_INT', 7)).toBe(7);
    });

    it('parses a trimmed integer', () => {
      process.env['TEST_INT'] = ' 42 ';
      expect(parseIntEnv('TEST_INT', 7)).toBe(42);
    });

    it('falls back on a fractional value', () => {
      process.env['TEST_INT'] = '3.14';
      expect(parseIntEnv('TEST_INT', 7)).toBe(7);
    });
  });

  describe('parseFloatEnv', () => {
    it('keeps the fraction', () => {
      process.env['TEST_FLOAT'] = '1.5';
      expect(parseFloatEnv('TEST_FLOAT', 2)).toBe(1.5);
    });

    it('falls back on garbage', () => {
      process.env['TEST_FLOAT'] = 'fast';
      expect(parseFloatEnv('TEST_FLOAT', 2)).toBe(2);
    });
  });

  describe('parseIntArrayEnv', () => {
    it('returns a copy of the default when unset', () => {
      delete process.env['TEST_LIST'];
      const defaults = [6, 8];

      const parsed = parseIntArrayEnv('TEST_LIST', defaults);

      expect(parsed).toEqual([6, 8]);
      expect(parsed).not.toBe(defaults);
    });

    it('drops non-integer entries', () => {
      process.env['TEST_LIST'] = '6, x, 8,,12';
      expect(parseIntArrayEnv('TEST_LIST', [1])).toEqual([6, 8, 12]);
    });
  });
});
