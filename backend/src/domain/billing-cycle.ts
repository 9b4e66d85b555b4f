import { InvalidIntervalError, InvalidUnitError } from './errors';
import { addDays } from '../utils/dates';
import { isBillingUnit, type BillingCycleSnapshot, type BillingUnit } from '../types/subscription';

// Approximations, not calendar arithmetic.
const DAYS_PER_WEEK = 7;
const DAYS_PER_MONTH = 30;
const DAYS_PER_YEAR = 365;
const WEEKS_PER_MONTH = 4.33;

/**
 * Immutable recurrence of `interval` x `unit`.
 *
 * Besides scheduling the next charge, a cycle converts any cadence into a
 * monthly or annual multiplier so subscriptions billed on different schedules
 * can be summed and compared.
 */
export class BillingCycle {
  readonly interval: number;
  readonly unit: BillingUnit;

  private constructor(interval: number, unit: BillingUnit) {
    this.interval = interval;
    this.unit = unit;
    Object.freeze(this);
  }

  static of(interval: number, unit: string): BillingCycle {
    if (!Number.isInteger(interval) || interval <= 0) {
      throw new InvalidIntervalError(interval);
    }
    if (!isBillingUnit(unit)) {
      throw new InvalidUnitError(unit);
    }
    return new BillingCycle(interval, unit);
  }

  static fromSnapshot(snapshot: BillingCycleSnapshot): BillingCycle {
    return BillingCycle.of(snapshot.interval, snapshot.unit);
  }

  /**
   * Next billing instant after `from`. Always strictly later than `from`.
   */
  nextDate(from: Date): Date {
    return addDays(from, this.lengthInDays());
  }

  lengthInDays(): number {
    switch (this.unit) {
      case 'days':
        return this.interval;
      case 'weeks':
        return this.interval * DAYS_PER_WEEK;
      case 'months':
        return this.interval * DAYS_PER_MONTH;
      case 'years':
        return this.interval * DAYS_PER_YEAR;
      default: {
        const unknown: never = this.unit;
        throw new InvalidUnitError(String(unknown));
      }
    }
  }

  monthlyEquivalent(): number {
    switch (this.unit) {
      case 'days':
        return DAYS_PER_MONTH / this.interval;
      case 'weeks':
        return WEEKS_PER_MONTH / this.interval;
      case 'months':
        return 1 / this.interval;
      case 'years':
        return 1 / (this.interval * 12);
      default: {
        const unknown: never = this.unit;
        throw new InvalidUnitError(String(unknown));
      }
    }
  }

  annualEquivalent(): number {
    return this.monthlyEquivalent() * 12;
  }

  equals(other: BillingCycle): boolean {
    return this.interval === other.interval && this.unit === other.unit;
  }

  describe(): string {
    return `every ${this.interval} ${this.unit}`;
  }

  toJSON(): BillingCycleSnapshot {
    return { interval: this.interval, unit: this.unit };
  }
}
