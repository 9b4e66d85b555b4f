import { v4 as uuidv4 } from 'uuid';
import { InvalidTimingError } from './errors';
import { daysBetween } from '../utils/dates';
import type { NotificationRuleSnapshot, NotificationTiming } from '../types/subscription';

export function daysBeforeFor(timing: NotificationTiming): number {
  switch (timing) {
    case '1_day':
      return 1;
    case '3_days':
      return 3;
    case '1_week':
      return 7;
    case '2_weeks':
      return 14;
    default: {
      const unknown: never = timing;
      throw new InvalidTimingError(String(unknown));
    }
  }
}

/**
 * When to remind about an upcoming renewal. Owned by a single subscription.
 */
export class NotificationRule {
  readonly id: string;
  readonly timing: NotificationTiming;
  readonly isEnabled: boolean;

  constructor(id: string, timing: NotificationTiming, isEnabled = true) {
    this.id = id;
    this.timing = timing;
    this.isEnabled = isEnabled;
    Object.freeze(this);
  }

  static create(timing: NotificationTiming): NotificationRule {
    return new NotificationRule(uuidv4(), timing, true);
  }

  static fromSnapshot(snapshot: NotificationRuleSnapshot): NotificationRule {
    return new NotificationRule(snapshot.id, snapshot.timing, snapshot.isEnabled);
  }

  daysBefore(): number {
    return daysBeforeFor(this.timing);
  }

  /**
   * Fires only on the exact day count, not within a window: one firing day
   * per rule per renewal.
   */
  shouldNotify(renewalDate: Date, now: Date = new Date()): boolean {
    if (!this.isEnabled) {
      return false;
    }
    return daysBetween(now, renewalDate) === this.daysBefore();
  }

  withEnabled(isEnabled: boolean): NotificationRule {
    return new NotificationRule(this.id, this.timing, isEnabled);
  }

  toJSON(): NotificationRuleSnapshot {
    return { id: this.id, timing: this.timing, isEnabled: this.isEnabled };
  }
}
