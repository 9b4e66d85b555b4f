import type { NotificationRule } from '../domain/notification-rule';
import type { Subscription } from '../domain/subscription';

export interface PendingNotification {
  subscription: Subscription;
  rules: NotificationRule[];
}

export class NotificationService {
  /**
   * Pending rules per subscription id. Subscriptions with nothing due today
   * are left out.
   */
  pendingNotifications(subscriptions: Subscription[], now: Date = new Date()): Map<string, PendingNotification> {
    const pending = new Map<string, PendingNotification>();

    for (const subscription of subscriptions) {
      const rules = subscription.getPendingNotifications(now);
      if (rules.length > 0) {
        pending.set(subscription.id, { subscription, rules });
      }
    }

    return pending;
  }
}

export const notificationService = new NotificationService();
