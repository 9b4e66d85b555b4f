import { BillingCycle } from '../domain/billing-cycle';
import { Money } from '../domain/money';
import type { Subscription } from '../domain/subscription';
import type { SubscriptionDetailsUpdateInput } from '../types/subscription';
import { SubscriptionCommand } from './subscription-command';

/**
 * Price change. Pending renewal events pick up the new amount; processed ones
 * keep what was charged. The currency defaults to the current one, and a
 * different currency is rejected by the aggregate.
 */
export class UpdateSubscriptionCostUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string, newAmount: number, currency?: string): Promise<Subscription> {
    const { subscription } = await this.mutate(subscriptionId, (target) => {
      target.updateCost(Money.of(newAmount, currency ?? target.cost.currency));
      return {
        result: undefined,
        history: { eventType: 'updated', description: 'Updated fields: cost' },
      };
    });
    return subscription;
  }
}

export class UpdateBillingCycleUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string, interval: number, unit: string): Promise<Subscription> {
    const cycle = BillingCycle.of(interval, unit);

    const { subscription } = await this.mutate(subscriptionId, (target, now) => {
      target.updateBillingCycle(cycle, now);
      return {
        result: undefined,
        history: { eventType: 'updated', description: 'Updated fields: billing_cycle' },
      };
    });
    return subscription;
  }
}

export class UpdateSubscriptionDetailsUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string, changes: SubscriptionDetailsUpdateInput): Promise<Subscription> {
    const { subscription } = await this.mutate(subscriptionId, (target) => {
      const changed = target.updateDetails(changes);
      return {
        result: changed,
        history:
          changed.length > 0 ? { eventType: 'updated', description: `Updated fields: ${changed.join(', ')}` } : null,
      };
    });
    return subscription;
  }
}
