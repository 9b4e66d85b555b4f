import { addDays, daysBetween, generateCycleId, parseDate } from '../src/utils/dates';

describe('date utilities', () => {
  describe('addDays', () => {
    it('should shift by whole 24h days', () => {
      expect(addDays(new Date('2026-01-31T00:00:00.000Z'), 30).toISOString()).toBe('2026-03-02T00:00:00.000Z');
    });

    it('should not mutate its input', () => {
      const date = new Date('2026-01-01T00:00:00.000Z');
      addDays(date, 1);
      expect(date.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    });
  });

  describe('daysBetween', () => {
    it('should floor partial days', () => {
      const from = new Date('2026-01-01T00:00:00.000Z');
      expect(daysBetween(from, new Date('2026-01-08T23:00:00.000Z'))).toBe(7);
    });

    it('should be negative when the target is in the past', () => {
      const from = new Date('2026-01-10T00:00:00.000Z');
      expect(daysBetween(from, new Date('2026-01-09T12:00:00.000Z'))).toBe(-1);
    });
  });

  describe('parseDate', () => {
    it('should accept ISO strings and Date objects', () => {
      expect(parseDate('2026-03-15T00:00:00.000Z').getTime()).toBe(Date.UTC(2026, 2, 15));
      const date = new Date(Date.UTC(2026, 2, 15));
      expect(parseDate(date)).toBe(date);
    });

    it('should throw on an unparseable string', () => {
      expect(() => parseDate('not-a-date')).toThrow('Invalid date: not-a-date');
    });
  });

  describe('generateCycleId', () => {
    it('should return YYYYMMDD from a Date object', () => {
      expect(generateCycleId(new Date(Date.UTC(2026, 2, 15)))).toBe(20260315);
    });

    it('should zero-pad single-digit month and day', () => {
      expect(generateCycleId(new Date(Date.UTC(2026, 0, 5)))).toBe(20260105);
    });

    it('should use the UTC calendar day', () => {
      expect(generateCycleId('2026-12-31T23:59:59.000Z')).toBe(20261231);
      expect(generateCycleId('2027-01-01T00:00:00.000Z')).toBe(20270101);
    });
  });
});
