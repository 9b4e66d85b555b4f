import { InvalidTimingError } from '../domain/errors';
import type { NotificationRule } from '../domain/notification-rule';
import { isNotificationTiming, type NotificationTiming } from '../types/subscription';
import { SubscriptionCommand } from './subscription-command';

export class AddNotificationRuleUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string, timing: string): Promise<NotificationRule> {
    if (!isNotificationTiming(timing)) {
      throw new InvalidTimingError(timing);
    }
    const ruleTiming: NotificationTiming = timing;

    const { result } = await this.mutate(subscriptionId, (target) => ({
      result: target.addNotificationRule(ruleTiming),
      history: { eventType: 'updated', description: `Added notification rule: ${ruleTiming}` },
    }));
    return result;
  }
}

export class SetNotificationRuleEnabledUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string, ruleId: string, isEnabled: boolean): Promise<NotificationRule> {
    const { result } = await this.mutate(subscriptionId, (target) => {
      const rule = target.setNotificationRuleEnabled(ruleId, isEnabled);
      return {
        result: rule,
        history: {
          eventType: 'updated',
          description: `Notification rule ${rule.timing} ${isEnabled ? 'enabled' : 'disabled'}`,
        },
      };
    });
    return result;
  }
}

export class RemoveNotificationRuleUseCase extends SubscriptionCommand {
  async execute(subscriptionId: string, ruleId: string): Promise<NotificationRule> {
    const { result } = await this.mutate(subscriptionId, (target) => {
      const rule = target.removeNotificationRule(ruleId);
      return {
        result: rule,
        history: { eventType: 'updated', description: `Removed notification rule: ${rule.timing}` },
      };
    });
    return result;
  }
}
