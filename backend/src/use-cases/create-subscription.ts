import logger from '../config/logger';
import { BillingCycle } from '../domain/billing-cycle';
import { NotFoundError } from '../domain/errors';
import { Money } from '../domain/money';
import { Subscription } from '../domain/subscription';
import type { ProviderRepository } from '../repositories/types';
import type { SubscriptionCreateInput } from '../types/subscription';
import { SubscriptionCommand, type SubscriptionCommandDependencies } from './subscription-command';

export interface CreateSubscriptionDependencies extends SubscriptionCommandDependencies {
  providerRepository: ProviderRepository;
}

export class CreateSubscriptionUseCase extends SubscriptionCommand {
  private readonly providerRepository: ProviderRepository;

  constructor(deps: CreateSubscriptionDependencies) {
    super(deps);
    this.providerRepository = deps.providerRepository;
  }

  async execute(input: SubscriptionCreateInput): Promise<Subscription> {
    const provider = await this.providerRepository.findById(input.providerId);
    if (!provider) {
      throw new NotFoundError('Provider', input.providerId);
    }

    const subscription = Subscription.create({
      name: input.name,
      provider,
      cost: Money.of(input.costAmount, input.currency),
      billingCycle: BillingCycle.of(input.billingInterval, input.billingUnit),
      startDate: input.startDate,
      nextBillingDate: input.nextBillingDate,
      notes: input.notes ?? null,
    });

    await this.subscriptionRepository.save(subscription);
    await this.recordHistory(
      subscription.id,
      { eventType: 'created', description: 'Subscription created' },
      this.clock(),
    );

    logger.info('Subscription created', {
      subscriptionId: subscription.id,
      providerId: provider.id,
      cost: subscription.cost.format(),
      billingCycle: subscription.billingCycle.describe(),
    });

    return subscription;
  }
}
