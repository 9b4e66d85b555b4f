import type { Money } from '../domain/money';
import type { RenewalEvent } from '../domain/renewal-event';
import type { Subscription } from '../domain/subscription';
import type { SubscriptionHistoryEntry } from './subscription';

export interface CategoryCost {
  category: string;
  total: Money;
}

export interface SubscriptionInsights {
  totalSubscriptions: number;
  activeSubscriptions: number;
  monthlyTotal: Money;
  annualTotal: Money;
  /** Monthly-equivalent cost per provider category, first-seen order. */
  categoryBreakdown: CategoryCost[];
  upcomingRenewals: RenewalEvent[];
}

export interface SubscriptionDetails {
  subscription: Subscription;
  monthlyCost: Money;
  annualCost: Money;
  monthlyCostInBase: Money;
  annualCostInBase: Money;
  baseCurrency: string;
  history: SubscriptionHistoryEntry[];
}
