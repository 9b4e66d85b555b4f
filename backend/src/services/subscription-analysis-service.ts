import { CurrencyMismatchError } from '../domain/errors';
import { DEFAULT_CURRENCY, Money } from '../domain/money';
import type { RenewalEvent } from '../domain/renewal-event';
import type { Subscription } from '../domain/subscription';
import { addDays } from '../utils/dates';

export const DEFAULT_UPCOMING_DAYS = 30;

/**
 * Stateless aggregations over a fetched set of subscriptions.
 * Totals assume a single currency per set and refuse to mix currencies.
 */
export class SubscriptionAnalysisService {
  constructor(private readonly fallbackCurrency: string = DEFAULT_CURRENCY) {}

  totalMonthlyCost(subscriptions: Subscription[]): Money {
    return this.sumContributing(subscriptions, (subscription) => subscription.calculateMonthlyCost());
  }

  totalAnnualCost(subscriptions: Subscription[]): Money {
    return this.sumContributing(subscriptions, (subscription) => subscription.calculateAnnualCost());
  }

  /**
   * Unprocessed renewal events of active subscriptions falling in
   * [now, now + days], earliest first. Ties keep input order.
   */
  upcomingRenewals(
    subscriptions: Subscription[],
    days: number = DEFAULT_UPCOMING_DAYS,
    now: Date = new Date(),
  ): RenewalEvent[] {
    const horizon = addDays(now, days);
    const upcoming: RenewalEvent[] = [];

    for (const subscription of subscriptions) {
      if (!subscription.isActive()) continue;

      for (const event of subscription.renewalEvents) {
        if (!event.isProcessed && event.isWithin(now, horizon)) {
          upcoming.push(event);
        }
      }
    }

    return upcoming.sort((a, b) => a.renewalDate.getTime() - b.renewalDate.getTime());
  }

  groupByCategory(subscriptions: Subscription[]): Map<string, Subscription[]> {
    const byCategory = new Map<string, Subscription[]>();

    for (const subscription of subscriptions) {
      const category = subscription.provider.category;
      const group = byCategory.get(category);
      if (group) {
        group.push(subscription);
      } else {
        byCategory.set(category, [subscription]);
      }
    }

    return byCategory;
  }

  /**
   * Monthly-equivalent cost per provider category, in first-seen order.
   */
  costBreakdownByCategory(subscriptions: Subscription[]): Map<string, Money> {
    const breakdown = new Map<string, Money>();

    for (const [category, group] of this.groupByCategory(subscriptions)) {
      breakdown.set(category, this.totalMonthlyCost(group));
    }

    return breakdown;
  }

  private sumContributing(subscriptions: Subscription[], costOf: (subscription: Subscription) => Money): Money {
    const contributing = subscriptions.filter((subscription) => subscription.contributesToExpenses());
    const currencies = [...new Set(contributing.map((subscription) => subscription.cost.currency))];

    if (currencies.length > 1) {
      throw new CurrencyMismatchError(currencies);
    }

    const currency = currencies[0] ?? subscriptions[0]?.cost.currency ?? this.fallbackCurrency;

    return contributing.reduce((total, subscription) => total.add(costOf(subscription)), Money.zero(currency));
  }
}

export const subscriptionAnalysisService = new SubscriptionAnalysisService();
