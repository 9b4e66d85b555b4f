import logger from '../config/logger';
import type { Money } from '../domain/money';
import type { SubscriptionRepository } from '../repositories/types';
import type { NotificationTiming } from '../types/subscription';
import { generateCycleId } from '../utils/dates';
import { NotificationService, notificationService } from './notification-service';

export interface RenewalReminder {
  subscriptionId: string;
  subscriptionName: string;
  providerName: string;
  renewalDate: Date;
  amount: Money;
  timing: NotificationTiming;
  daysBefore: number;
}

/**
 * Delivery target for reminders. Implementations throw to signal a failed
 * delivery; the engine counts it and moves on.
 */
export interface ReminderChannel {
  readonly name: string;
  send(reminder: RenewalReminder): Promise<void>;
}

export const loggerReminderChannel: ReminderChannel = {
  name: 'log',
  async send(reminder: RenewalReminder): Promise<void> {
    logger.info(`Renewal reminder: ${reminder.subscriptionName} renews in ${reminder.daysBefore} day(s)`, {
      subscriptionId: reminder.subscriptionId,
      provider: reminder.providerName,
      renewalDate: reminder.renewalDate.toISOString(),
      amount: reminder.amount.format(),
      timing: reminder.timing,
    });
  },
};

export interface ReminderResult {
  processed: number;
  sent: number;
  skipped: number;
  errors: number;
}

export class ReminderEngine {
  /** Delivered `subscriptionId:timing` pairs, grouped by renewal cycle id. */
  private readonly delivered = new Map<number, Set<string>>();

  constructor(
    private readonly subscriptionRepository: SubscriptionRepository,
    private readonly channel: ReminderChannel = loggerReminderChannel,
    private readonly notifications: NotificationService = notificationService,
  ) {}

  /**
   * Send every reminder due at `now`. A reminder counts as processed once per
   * (subscription, rule) pair; pairs already delivered for the same billing
   * date are skipped. Records for renewal dates before `now` are dropped.
   */
  async processReminders(now: Date = new Date()): Promise<ReminderResult> {
    logger.info('Processing renewal reminders');

    this.pruneDelivered(generateCycleId(now));

    const result: ReminderResult = { processed: 0, sent: 0, skipped: 0, errors: 0 };

    const subscriptions = await this.subscriptionRepository.findActive();
    const pending = this.notifications.pendingNotifications(subscriptions, now);

    if (pending.size === 0) {
      logger.info('No reminders due');
      return result;
    }

    for (const { subscription, rules } of pending.values()) {
      const renewalDate = subscription.nextBillingDate;
      const cycleId = generateCycleId(renewalDate);

      for (const rule of rules) {
        result.processed++;

        if (this.hasDelivered(subscription.id, rule.timing, renewalDate)) {
          result.skipped++;
          continue;
        }

        try {
          await this.channel.send({
            subscriptionId: subscription.id,
            subscriptionName: subscription.name,
            providerName: subscription.provider.name,
            renewalDate,
            amount: subscription.cost,
            timing: rule.timing,
            daysBefore: rule.daysBefore(),
          });
          this.markDelivered(cycleId, `${subscription.id}:${rule.timing}`);
          result.sent++;
        } catch (error) {
          logger.error(`Error sending ${rule.timing} reminder for subscription ${subscription.id}:`, error);
          result.errors++;
        }
      }
    }

    logger.info('Reminder processing completed', { ...result, channel: this.channel.name });
    return result;
  }

  hasDelivered(subscriptionId: string, timing: NotificationTiming, renewalDate: Date): boolean {
    return this.delivered.get(generateCycleId(renewalDate))?.has(`${subscriptionId}:${timing}`) ?? false;
  }

  private markDelivered(cycleId: number, key: string): void {
    const keys = this.delivered.get(cycleId) ?? new Set<string>();
    keys.add(key);
    this.delivered.set(cycleId, keys);
  }

  private pruneDelivered(currentCycleId: number): void {
    for (const cycleId of this.delivered.keys()) {
      if (cycleId < currentCycleId) {
        this.delivered.delete(cycleId);
      }
    }
  }
}
