import { v4 as uuidv4 } from 'uuid';
import { BillingCycle } from './billing-cycle';
import {
  DuplicateRuleError,
  IncompatibleCurrencyError,
  InconsistentStateError,
  InvalidTransitionError,
  NotFoundError,
} from './errors';
import { Money } from './money';
import { NotificationRule } from './notification-rule';
import { Provider } from './provider';
import { RenewalEvent } from './renewal-event';
import { parseDate } from '../utils/dates';
import type {
  NotificationTiming,
  SubscriptionDetailsUpdateInput,
  SubscriptionSnapshot,
  SubscriptionStatus,
} from '../types/subscription';

export interface SubscriptionProps {
  id: string;
  name: string;
  provider: Provider;
  cost: Money;
  billingCycle: BillingCycle;
  status: SubscriptionStatus;
  startDate: Date;
  nextBillingDate: Date;
  cancellationDate?: Date | null;
  notes?: string | null;
  notificationRules?: NotificationRule[];
  renewalEvents?: RenewalEvent[];
}

export interface NewSubscriptionParams {
  id?: string;
  name: string;
  provider: Provider;
  cost: Money;
  billingCycle: BillingCycle;
  startDate: Date;
  nextBillingDate: Date;
  notes?: string | null;
}

function copyDate(date: Date): Date {
  return new Date(date.getTime());
}

/**
 * Aggregate root for a tracked subscription.
 *
 * Owns its notification rules and renewal events; every change to either goes
 * through a method here so the invariants hold:
 * - at most one notification rule per timing
 * - a cancelled subscription has a cancellation date and keeps only processed
 *   renewal events
 * - processed renewal events are never rewritten
 *
 * Collections and dates handed out by getters are copies.
 */
export class Subscription {
  readonly id: string;
  private _name: string;
  private readonly _provider: Provider;
  private _cost: Money;
  private _billingCycle: BillingCycle;
  private _status: SubscriptionStatus;
  private readonly _startDate: Date;
  private _nextBillingDate: Date;
  private _cancellationDate: Date | null;
  private _notes: string | null;
  private _notificationRules: NotificationRule[];
  private _renewalEvents: RenewalEvent[];

  private constructor(props: SubscriptionProps) {
    this.id = props.id;
    this._name = props.name;
    this._provider = props.provider;
    this._cost = props.cost;
    this._billingCycle = props.billingCycle;
    this._status = props.status;
    this._startDate = copyDate(props.startDate);
    this._nextBillingDate = copyDate(props.nextBillingDate);
    this._cancellationDate = props.cancellationDate ? copyDate(props.cancellationDate) : null;
    this._notes = props.notes ?? null;
    this._notificationRules = [...(props.notificationRules ?? [])];
    this._renewalEvents = [...(props.renewalEvents ?? [])];
  }

  /**
   * New active subscription with its first renewal event seeded at
   * `nextBillingDate`.
   */
  static create(params: NewSubscriptionParams): Subscription {
    const subscription = new Subscription({
      id: params.id ?? uuidv4(),
      name: params.name,
      provider: params.provider,
      cost: params.cost,
      billingCycle: params.billingCycle,
      status: 'active',
      startDate: params.startDate,
      nextBillingDate: params.nextBillingDate,
      notes: params.notes ?? null,
    });
    subscription.generateNextRenewalEvent();
    return subscription;
  }

  /**
   * Rehydrate an existing aggregate. No renewal event is generated.
   */
  static restore(props: SubscriptionProps): Subscription {
    const seen = new Set<NotificationTiming>();
    for (const rule of props.notificationRules ?? []) {
      if (seen.has(rule.timing)) {
        throw new DuplicateRuleError(rule.timing);
      }
      seen.add(rule.timing);
    }

    if (props.status === 'cancelled') {
      if (!props.cancellationDate) {
        throw new InconsistentStateError(props.id, 'Cancelled subscription has no cancellation date');
      }
      if ((props.renewalEvents ?? []).some((event) => !event.isProcessed)) {
        throw new InconsistentStateError(props.id, 'Cancelled subscription has pending renewal events');
      }
    }

    return new Subscription(props);
  }

  static fromSnapshot(snapshot: SubscriptionSnapshot): Subscription {
    return Subscription.restore({
      id: snapshot.id,
      name: snapshot.name,
      provider: Provider.fromSnapshot(snapshot.provider),
      cost: Money.fromSnapshot(snapshot.cost),
      billingCycle: BillingCycle.fromSnapshot(snapshot.billingCycle),
      status: snapshot.status,
      startDate: parseDate(snapshot.startDate),
      nextBillingDate: parseDate(snapshot.nextBillingDate),
      cancellationDate: snapshot.cancellationDate ? parseDate(snapshot.cancellationDate) : null,
      notes: snapshot.notes,
      notificationRules: snapshot.notificationRules.map((rule) => NotificationRule.fromSnapshot(rule)),
      renewalEvents: snapshot.renewalEvents.map((event) => RenewalEvent.fromSnapshot(event)),
    });
  }

  get name(): string {
    return this._name;
  }

  get provider(): Provider {
    return this._provider;
  }

  get cost(): Money {
    return this._cost;
  }

  get billingCycle(): BillingCycle {
    return this._billingCycle;
  }

  get status(): SubscriptionStatus {
    return this._status;
  }

  get startDate(): Date {
    return copyDate(this._startDate);
  }

  get nextBillingDate(): Date {
    return copyDate(this._nextBillingDate);
  }

  get cancellationDate(): Date | null {
    return this._cancellationDate ? copyDate(this._cancellationDate) : null;
  }

  get notes(): string | null {
    return this._notes;
  }

  get notificationRules(): NotificationRule[] {
    return [...this._notificationRules];
  }

  get renewalEvents(): RenewalEvent[] {
    return [...this._renewalEvents];
  }

  isActive(): boolean {
    return this._status === 'active';
  }

  isPaused(): boolean {
    return this._status === 'paused';
  }

  isCancelled(): boolean {
    return this._status === 'cancelled';
  }

  /**
   * Only active subscriptions count towards recurring expenses.
   */
  contributesToExpenses(): boolean {
    return this.isActive();
  }

  pause(): void {
    if (this.isCancelled()) {
      throw new InvalidTransitionError(this.id, this._status, 'pause', 'Cannot pause a cancelled subscription');
    }
    if (this.isPaused()) {
      throw new InvalidTransitionError(this.id, this._status, 'pause', 'Subscription is already paused');
    }
    this._status = 'paused';
  }

  resume(now: Date = new Date()): void {
    if (!this.isPaused()) {
      throw new InvalidTransitionError(this.id, this._status, 'resume', 'Can only resume paused subscriptions');
    }
    this._status = 'active';
    this._nextBillingDate = this._billingCycle.nextDate(now);
    this.generateNextRenewalEvent();
  }

  /**
   * Terminal. Pending renewal events are dropped; processed ones are history.
   */
  cancel(now: Date = new Date()): void {
    if (this.isCancelled()) {
      throw new InvalidTransitionError(this.id, this._status, 'cancel', 'Subscription is already cancelled');
    }
    this._status = 'cancelled';
    this._cancellationDate = copyDate(now);
    this._renewalEvents = this._renewalEvents.filter((event) => event.isProcessed);
  }

  updateCost(newCost: Money): void {
    if (newCost.currency !== this._cost.currency) {
      throw new IncompatibleCurrencyError(this._cost.currency, newCost.currency);
    }
    this._cost = newCost;
    this._renewalEvents = this._renewalEvents.map((event) =>
      event.isProcessed ? event : event.withAmount(newCost),
    );
  }

  updateBillingCycle(newCycle: BillingCycle, now: Date = new Date()): void {
    this._billingCycle = newCycle;
    this._nextBillingDate = newCycle.nextDate(now);
    this.regenerateRenewalEvents();
  }

  /**
   * Returns the names of the fields that actually changed.
   */
  updateDetails(changes: SubscriptionDetailsUpdateInput): string[] {
    const changed: string[] = [];

    if (changes.name !== undefined && changes.name !== this._name) {
      this._name = changes.name;
      changed.push('name');
    }
    if (changes.notes !== undefined && changes.notes !== this._notes) {
      this._notes = changes.notes;
      changed.push('notes');
    }

    return changed;
  }

  /**
   * Matures at most one due event, then schedules the next one.
   *
   * The next billing date advances from the previous billing date rather than
   * from `now`, so late processing keeps the original cadence.
   */
  processRenewal(now: Date = new Date()): RenewalEvent {
    if (!this.isActive()) {
      throw new InvalidTransitionError(
        this.id,
        this._status,
        'process_renewal',
        'Cannot process renewal for inactive subscription',
      );
    }

    const dueIndex = this._renewalEvents.findIndex((event) => event.isDue(now));
    if (dueIndex !== -1) {
      const matured = this._renewalEvents[dueIndex].markProcessed();
      this._renewalEvents = this._renewalEvents.map((event, index) => (index === dueIndex ? matured : event));
    }

    this._nextBillingDate = this._billingCycle.nextDate(this._nextBillingDate);
    return this.generateNextRenewalEvent();
  }

  hasDueRenewal(now: Date = new Date()): boolean {
    return this._renewalEvents.some((event) => event.isDue(now));
  }

  addNotificationRule(timing: NotificationTiming): NotificationRule {
    if (this._notificationRules.some((rule) => rule.timing === timing)) {
      throw new DuplicateRuleError(timing);
    }

    const rule = NotificationRule.create(timing);
    this._notificationRules = [...this._notificationRules, rule];
    return rule;
  }

  setNotificationRuleEnabled(ruleId: string, isEnabled: boolean): NotificationRule {
    const existing = this.findRule(ruleId);
    const updated = existing.withEnabled(isEnabled);
    this._notificationRules = this._notificationRules.map((rule) => (rule.id === ruleId ? updated : rule));
    return updated;
  }

  removeNotificationRule(ruleId: string): NotificationRule {
    const existing = this.findRule(ruleId);
    this._notificationRules = this._notificationRules.filter((rule) => rule.id !== ruleId);
    return existing;
  }

  calculateMonthlyCost(): Money {
    if (!this.contributesToExpenses()) {
      return Money.zero(this._cost.currency);
    }
    return this._cost.scale(this._billingCycle.monthlyEquivalent());
  }

  calculateAnnualCost(): Money {
    if (!this.contributesToExpenses()) {
      return Money.zero(this._cost.currency);
    }
    return this._cost.scale(this._billingCycle.annualEquivalent());
  }

  getPendingNotifications(now: Date = new Date()): NotificationRule[] {
    if (!this.isActive()) {
      return [];
    }
    return this._notificationRules.filter((rule) => rule.shouldNotify(this._nextBillingDate, now));
  }

  toSnapshot(): SubscriptionSnapshot {
    return {
      id: this.id,
      name: this._name,
      provider: this._provider.toJSON(),
      cost: this._cost.toJSON(),
      billingCycle: this._billingCycle.toJSON(),
      status: this._status,
      startDate: this._startDate.toISOString(),
      nextBillingDate: this._nextBillingDate.toISOString(),
      cancellationDate: this._cancellationDate ? this._cancellationDate.toISOString() : null,
      notes: this._notes,
      notificationRules: this._notificationRules.map((rule) => rule.toJSON()),
      renewalEvents: this._renewalEvents.map((event) => event.toJSON()),
    };
  }

  toJSON(): SubscriptionSnapshot {
    return this.toSnapshot();
  }

  private findRule(ruleId: string): NotificationRule {
    const rule = this._notificationRules.find((candidate) => candidate.id === ruleId);
    if (!rule) {
      throw new NotFoundError('NotificationRule', ruleId);
    }
    return rule;
  }

  private generateNextRenewalEvent(): RenewalEvent {
    const event = RenewalEvent.schedule(this.id, this._nextBillingDate, this._cost);
    this._renewalEvents = [...this._renewalEvents, event];
    return event;
  }

  private regenerateRenewalEvents(): void {
    this._renewalEvents = this._renewalEvents.filter((event) => event.isProcessed);
    if (this.isActive()) {
      this.generateNextRenewalEvent();
    }
  }
}
