import { v4 as uuidv4 } from 'uuid';
import { Money } from './money';
import { parseDate } from '../utils/dates';
import type { RenewalEventSnapshot } from '../types/subscription';

/**
 * A scheduled (or, once processed, historical) renewal charge.
 */
export class RenewalEvent {
  readonly id: string;
  readonly subscriptionId: string;
  readonly renewalDate: Date;
  readonly amount: Money;
  readonly isProcessed: boolean;

  constructor(id: string, subscriptionId: string, renewalDate: Date, amount: Money, isProcessed = false) {
    this.id = id;
    this.subscriptionId = subscriptionId;
    this.renewalDate = new Date(renewalDate.getTime());
    this.amount = amount;
    this.isProcessed = isProcessed;
    Object.freeze(this);
  }

  static schedule(subscriptionId: string, renewalDate: Date, amount: Money): RenewalEvent {
    return new RenewalEvent(uuidv4(), subscriptionId, renewalDate, amount, false);
  }

  static fromSnapshot(snapshot: RenewalEventSnapshot): RenewalEvent {
    return new RenewalEvent(
      snapshot.id,
      snapshot.subscriptionId,
      parseDate(snapshot.renewalDate),
      Money.fromSnapshot(snapshot.amount),
      snapshot.isProcessed,
    );
  }

  isDue(now: Date): boolean {
    return !this.isProcessed && this.renewalDate.getTime() <= now.getTime();
  }

  isWithin(start: Date, end: Date): boolean {
    const time = this.renewalDate.getTime();
    return time >= start.getTime() && time <= end.getTime();
  }

  markProcessed(): RenewalEvent {
    return new RenewalEvent(this.id, this.subscriptionId, this.renewalDate, this.amount, true);
  }

  withAmount(amount: Money): RenewalEvent {
    return new RenewalEvent(this.id, this.subscriptionId, this.renewalDate, amount, this.isProcessed);
  }

  toJSON(): RenewalEventSnapshot {
    return {
      id: this.id,
      subscriptionId: this.subscriptionId,
      renewalDate: this.renewalDate.toISOString(),
      amount: this.amount.toJSON(),
      isProcessed: this.isProcessed,
    };
  }
}
