import { InvalidStatusError, NotFoundError } from '../domain/errors';
import type { Subscription } from '../domain/subscription';
import { DEFAULT_HISTORY_LIMIT, type SubscriptionHistoryRepository, type SubscriptionRepository } from '../repositories/types';
import { CurrencyService } from '../services/currency-service';
import {
  DEFAULT_UPCOMING_DAYS,
  SubscriptionAnalysisService,
  subscriptionAnalysisService,
} from '../services/subscription-analysis-service';
import type { SubscriptionDetails, SubscriptionInsights } from '../types/insights';
import { isSubscriptionStatus, type SubscriptionListFilter, type SubscriptionOrder } from '../types/subscription';
import { systemClock, type Clock } from './subscription-command';

function compareBy(order: SubscriptionOrder): (a: Subscription, b: Subscription) => number {
  switch (order) {
    case 'name':
      return (a, b) => a.name.localeCompare(b.name);
    case '-name':
      return (a, b) => b.name.localeCompare(a.name);
    case 'cost':
      return (a, b) => a.cost.amount - b.cost.amount;
    case '-cost':
      return (a, b) => b.cost.amount - a.cost.amount;
    default: {
      const unknown: never = order;
      throw new Error(`Unknown order "${String(unknown)}"`);
    }
  }
}

export class ListSubscriptionsUseCase {
  constructor(private readonly subscriptionRepository: SubscriptionRepository) {}

  async execute(filter: SubscriptionListFilter = {}): Promise<Subscription[]> {
    const { status, costMin, costMax, order } = filter;
    if (status !== undefined && !isSubscriptionStatus(status)) {
      throw new InvalidStatusError(status);
    }

    const candidates = filter.providerId
      ? await this.subscriptionRepository.findByProvider(filter.providerId)
      : await this.subscriptionRepository.findAll();

    const matches = candidates.filter(
      (subscription) =>
        (status === undefined || subscription.status === status) &&
        (costMin === undefined || subscription.cost.amount >= costMin) &&
        (costMax === undefined || subscription.cost.amount <= costMax),
    );

    return order ? matches.sort(compareBy(order)) : matches;
  }
}

export class GetSubscriptionDetailsUseCase {
  constructor(
    private readonly subscriptionRepository: SubscriptionRepository,
    private readonly historyRepository: SubscriptionHistoryRepository,
    private readonly currencyService: CurrencyService = new CurrencyService(),
  ) {}

  async execute(subscriptionId: string, historyLimit: number = DEFAULT_HISTORY_LIMIT): Promise<SubscriptionDetails> {
    const subscription = await this.subscriptionRepository.findById(subscriptionId);
    if (!subscription) {
      throw new NotFoundError('Subscription', subscriptionId);
    }

    const monthlyCost = subscription.calculateMonthlyCost();
    const annualCost = subscription.calculateAnnualCost();

    return {
      subscription,
      monthlyCost,
      annualCost,
      monthlyCostInBase: this.currencyService.convertToBase(monthlyCost),
      annualCostInBase: this.currencyService.convertToBase(annualCost),
      baseCurrency: this.currencyService.baseCurrency,
      history: await this.historyRepository.findBySubscription(subscriptionId, historyLimit),
    };
  }
}

export interface InsightsOptions {
  upcomingDays?: number;
  clock?: Clock;
}

export class GetSubscriptionInsightsUseCase {
  private readonly upcomingDays: number;
  private readonly clock: Clock;

  constructor(
    private readonly subscriptionRepository: SubscriptionRepository,
    private readonly analysisService: SubscriptionAnalysisService = subscriptionAnalysisService,
    options: InsightsOptions = {},
  ) {
    this.upcomingDays = options.upcomingDays ?? DEFAULT_UPCOMING_DAYS;
    this.clock = options.clock ?? systemClock;
  }

  async execute(): Promise<SubscriptionInsights> {
    const subscriptions = await this.subscriptionRepository.findAll();
    const breakdown = this.analysisService.costBreakdownByCategory(subscriptions);

    return {
      totalSubscriptions: subscriptions.length,
      activeSubscriptions: subscriptions.filter((subscription) => subscription.isActive()).length,
      monthlyTotal: this.analysisService.totalMonthlyCost(subscriptions),
      annualTotal: this.analysisService.totalAnnualCost(subscriptions),
      categoryBreakdown: Array.from(breakdown, ([category, total]) => ({ category, total })),
      upcomingRenewals: this.analysisService.upcomingRenewals(subscriptions, this.upcomingDays, this.clock()),
    };
  }
}
