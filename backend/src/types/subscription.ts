export const SUBSCRIPTION_STATUSES = ['active', 'paused', 'cancelled'] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export const BILLING_UNITS = ['days', 'weeks', 'months', 'years'] as const;
export type BillingUnit = (typeof BILLING_UNITS)[number];

export const NOTIFICATION_TIMINGS = ['1_day', '3_days', '1_week', '2_weeks'] as const;
export type NotificationTiming = (typeof NOTIFICATION_TIMINGS)[number];

export const HISTORY_EVENT_TYPES = ['created', 'updated', 'status_changed'] as const;
export type HistoryEventType = (typeof HISTORY_EVENT_TYPES)[number];

export function isSubscriptionStatus(value: string): value is SubscriptionStatus {
  return SUBSCRIPTION_STATUSES.some((status) => status === value);
}

export function isBillingUnit(value: string): value is BillingUnit {
  return BILLING_UNITS.some((unit) => unit === value);
}

export function isHistoryEventType(value: string): value is HistoryEventType {
  return HISTORY_EVENT_TYPES.some((eventType) => eventType === value);
}

export function isNotificationTiming(value: string): value is NotificationTiming {
  return NOTIFICATION_TIMINGS.some((timing) => timing === value);
}

export interface MoneySnapshot {
  amount: number;
  currency: string;
}

export interface BillingCycleSnapshot {
  interval: number;
  unit: BillingUnit;
}

export interface ProviderSnapshot {
  id: string;
  name: string;
  category: string;
  website: string | null;
}

export interface NotificationRuleSnapshot {
  id: string;
  timing: NotificationTiming;
  isEnabled: boolean;
}

export interface RenewalEventSnapshot {
  id: string;
  subscriptionId: string;
  renewalDate: string; // ISO 8601
  amount: MoneySnapshot;
  isProcessed: boolean;
}

/**
 * Plain-data form of a subscription aggregate, as stored by repositories.
 */
export interface SubscriptionSnapshot {
  id: string;
  name: string;
  provider: ProviderSnapshot;
  cost: MoneySnapshot;
  billingCycle: BillingCycleSnapshot;
  status: SubscriptionStatus;
  startDate: string;
  nextBillingDate: string;
  cancellationDate: string | null;
  notes: string | null;
  notificationRules: NotificationRuleSnapshot[];
  renewalEvents: RenewalEventSnapshot[];
}

export interface SubscriptionCreateInput {
  name: string;
  providerId: string;
  costAmount: number;
  currency?: string;
  billingInterval: number;
  billingUnit: string;
  startDate: Date;
  nextBillingDate: Date;
  notes?: string;
}

export interface SubscriptionDetailsUpdateInput {
  name?: string;
  notes?: string | null;
}

export interface ProviderCreateInput {
  name: string;
  category: string;
  website?: string;
}

export type SubscriptionOrder = 'name' | '-name' | 'cost' | '-cost';

export interface SubscriptionListFilter {
  providerId?: string;
  status?: string;
  costMin?: number;
  costMax?: number;
  order?: SubscriptionOrder;
}

export interface SubscriptionHistoryEntry {
  id: string;
  subscriptionId: string;
  eventType: HistoryEventType;
  description: string;
  createdAt: Date;
}
