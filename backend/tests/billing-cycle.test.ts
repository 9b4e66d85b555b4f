import { BillingCycle } from '../src/domain/billing-cycle';
import { InvalidIntervalError, InvalidUnitError } from '../src/domain/errors';

describe('BillingCycle', () => {
  it('should reject zero, negative and fractional intervals', () => {
    expect(() => BillingCycle.of(0, 'months')).toThrow(InvalidIntervalError);
    expect(() => BillingCycle.of(-1, 'months')).toThrow(InvalidIntervalError);
    expect(() => BillingCycle.of(1.5, 'months')).toThrow(InvalidIntervalError);
  });

  it('should reject unknown units', () => {
    expect(() => BillingCycle.of(1, 'fortnights')).toThrow(InvalidUnitError);
    expect(() => BillingCycle.of(1, 'fortnights')).toThrow(
      'Billing unit must be days, weeks, months, or years, got "fortnights"',
    );
  });

  describe('nextDate', () => {
    const from = new Date('2026-01-31T00:00:00.000Z');

    it.each([
      [1, 'days', '2026-02-01T00:00:00.000Z'],
      [2, 'weeks', '2026-02-14T00:00:00.000Z'],
      [1, 'months', '2026-03-02T00:00:00.000Z'],
      [1, 'years', '2027-01-31T00:00:00.000Z'],
    ])('should add %i %s', (interval, unit, expected) => {
      expect(BillingCycle.of(interval, unit).nextDate(from).toISOString()).toBe(expected);
    });

    it('should always move strictly forward', () => {
      const cycle = BillingCycle.of(1, 'days');
      expect(cycle.nextDate(from).getTime()).toBeGreaterThan(from.getTime());
    });
  });

  describe('monthlyEquivalent', () => {
    it('should convert each unit to a monthly multiplier', () => {
      expect(BillingCycle.of(1, 'days').monthlyEquivalent()).toBe(30);
      expect(BillingCycle.of(1, 'weeks').monthlyEquivalent()).toBe(4.33);
      expect(BillingCycle.of(1, 'months').monthlyEquivalent()).toBe(1);
      expect(BillingCycle.of(3, 'months').monthlyEquivalent()).toBeCloseTo(1 / 3);
      expect(BillingCycle.of(1, 'years').monthlyEquivalent()).toBeCloseTo(1 / 12);
    });

    it('should derive annual from monthly', () => {
      expect(BillingCycle.of(1, 'months').annualEquivalent()).toBe(12);
      expect(BillingCycle.of(1, 'years').annualEquivalent()).toBeCloseTo(1);
      expect(BillingCycle.of(1, 'weeks').annualEquivalent()).toBeCloseTo(51.96);
    });
  });

  it('should compare by value', () => {
    expect(BillingCycle.of(1, 'months').equals(BillingCycle.of(1, 'months'))).toBe(true);
    expect(BillingCycle.of(1, 'months').equals(BillingCycle.of(30, 'days'))).toBe(false);
  });

  it('should describe itself', () => {
    expect(BillingCycle.of(3, 'months').describe()).toBe('every 3 months');
  });
});
