import type { RenewalEvent } from '../domain/renewal-event';
import type { Subscription } from '../domain/subscription';
import { SubscriptionCommand } from './subscription-command';

export class PauseSubscriptionUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string): Promise<Subscription> {
    const { subscription } = await this.mutate(subscriptionId, (target) => {
      target.pause();
      return { result: undefined, history: { eventType: 'status_changed', description: 'Subscription paused' } };
    });
    return subscription;
  }
}

export class ResumeSubscriptionUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string): Promise<Subscription> {
    const { subscription } = await this.mutate(subscriptionId, (target, now) => {
      target.resume(now);
      return { result: undefined, history: { eventType: 'status_changed', description: 'Subscription resumed' } };
    });
    return subscription;
  }
}

export class CancelSubscriptionUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string): Promise<Subscription> {
    const { subscription } = await this.mutate(subscriptionId, (target, now) => {
      target.cancel(now);
      return { result: undefined, history: { eventType: 'status_changed', description: 'Subscription cancelled' } };
    });
    return subscription;
  }
}

export interface RenewalOutcome {
  subscription: Subscription;
  /** The newly scheduled event, or null when nothing was due. */
  scheduled: RenewalEvent | null;
}

export class ProcessRenewalUseCase extends SubscriptionCommand {
  /**
   * Mature one due renewal. The due check runs again under the lock, so a
   * caller that picked this subscription from an earlier read cannot advance
   * it twice.
   */
  async execute(subscriptionId: string): Promise<RenewalOutcome> {
    const { subscription, result } = await this.mutate<RenewalEvent | null>(subscriptionId, (target, now) => {
      if (!target.hasDueRenewal(now)) {
        return { result: null, history: null, changed: false };
      }

      const scheduled = target.processRenewal(now);
      return {
        result: scheduled,
        history: {
          eventType: 'updated',
          description: `Renewal processed, next billing on ${scheduled.renewalDate.toISOString()}`,
        },
      };
    });
    return { subscription, scheduled: result };
  }
}
