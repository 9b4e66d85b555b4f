import { BillingCycle } from '../../src/domain/billing-cycle';
import { Money } from '../../src/domain/money';
import { Provider } from '../../src/domain/provider';
import { Subscription, type NewSubscriptionParams } from '../../src/domain/subscription';

export const JAN_1 = new Date('2026-01-01T00:00:00.000Z');
export const JAN_31 = new Date('2026-01-31T00:00:00.000Z');

export function utc(iso: string): Date {
  return new Date(`${iso}T00:00:00.000Z`);
}

export function makeProvider(name = 'Netflix', category = 'Streaming'): Provider {
  return new Provider(`provider-${name.toLowerCase()}`, name, category);
}

export function makeSubscription(overrides: Partial<NewSubscriptionParams> = {}): Subscription {
  return Subscription.create({
    name: 'Netflix Premium',
    provider: makeProvider(),
    cost: Money.of(15.99, 'USD'),
    billingCycle: BillingCycle.of(1, 'months'),
    startDate: JAN_1,
    nextBillingDate: JAN_31,
    ...overrides,
  });
}
