import logger from '../config/logger';
import type { SubscriptionRepository } from '../repositories/types';
import type { ProcessRenewalUseCase } from '../use-cases/subscription-status';

export interface RenewalProcessingResult {
  processed: number;
  renewed: number;
  skipped: number;
  errors: number;
}

export class RenewalProcessor {
  constructor(
    private readonly subscriptionRepository: SubscriptionRepository,
    private readonly processRenewal: ProcessRenewalUseCase,
  ) {}

  /**
   * Mature due renewal events for all active subscriptions. Each subscription
   * advances by at most one billing period per run.
   */
  async processDueRenewals(now: Date = new Date()): Promise<RenewalProcessingResult> {
    logger.info('Processing due renewals');

    const result: RenewalProcessingResult = { processed: 0, renewed: 0, skipped: 0, errors: 0 };

    const candidates = (await this.subscriptionRepository.findActive()).filter((subscription) =>
      subscription.hasDueRenewal(now),
    );

    if (candidates.length === 0) {
      logger.info('No renewals due');
      return result;
    }

    logger.info(`Found ${candidates.length} subscriptions with due renewals`);
    result.processed = candidates.length;

    for (const subscription of candidates) {
      try {
        const { scheduled } = await this.processRenewal.execute(subscription.id);
        if (!scheduled) {
          // Another run matured it after the candidate read.
          logger.debug('Renewal no longer due', { subscriptionId: subscription.id });
          result.skipped++;
          continue;
        }
        logger.debug('Renewal scheduled', {
          subscriptionId: subscription.id,
          nextBillingDate: scheduled.renewalDate.toISOString(),
        });
        result.renewed++;
      } catch (error) {
        logger.error(`Error processing renewal for subscription ${subscription.id}:`, error);
        result.errors++;
      }
    }

    logger.info('Renewal processing completed', { ...result });
    return result;
  }
}
