import type { SupabaseClient } from '@supabase/supabase-js';
import logger from '../config/logger';
import { BillingCycle } from '../domain/billing-cycle';
import { InvalidStatusError, InvalidTimingError } from '../domain/errors';
import { Money } from '../domain/money';
import { NotificationRule } from '../domain/notification-rule';
import { Provider } from '../domain/provider';
import { RenewalEvent } from '../domain/renewal-event';
import { Subscription } from '../domain/subscription';
import { parseDate } from '../utils/dates';
import {
  isHistoryEventType,
  isNotificationTiming,
  isSubscriptionStatus,
  type SubscriptionHistoryEntry,
} from '../types/subscription';
import {
  DEFAULT_HISTORY_LIMIT,
  type ProviderRepository,
  type SubscriptionHistoryRepository,
  type SubscriptionRepository,
} from './types';

export interface ProviderRow {
  id: string;
  name: string;
  category: string;
  website: string | null;
}

export interface NotificationRuleRow {
  id: string;
  subscription_id: string;
  timing: string;
  is_enabled: boolean;
}

export interface RenewalEventRow {
  id: string;
  subscription_id: string;
  renewal_date: string;
  amount_amount: number | string;
  amount_currency: string;
  is_processed: boolean;
  position: number;
}

export interface SubscriptionRow {
  id: string;
  name: string;
  provider_id: string;
  cost_amount: number | string;
  cost_currency: string;
  billing_interval: number;
  billing_unit: string;
  status: string;
  start_date: string;
  next_billing_date: string;
  cancellation_date: string | null;
  notes: string | null;
  provider: ProviderRow;
  notification_rules: NotificationRuleRow[] | null;
  renewal_events: RenewalEventRow[] | null;
}

interface HistoryRow {
  id: string;
  subscription_id: string;
  event_type: string;
  description: string;
  created_at: string;
}

const SUBSCRIPTION_SELECT = '*, provider:providers(*), notification_rules(*), renewal_events(*)';

function assertNoError(error: { message: string } | null, message: string, meta: Record<string, unknown>): void {
  if (error) {
    logger.error(message, { ...meta, error: error.message });
    throw new Error(`Database error: ${error.message}`);
  }
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export function providerFromRow(row: ProviderRow): Provider {
  return new Provider(row.id, row.name, row.category, row.website);
}

export function subscriptionFromRow(row: SubscriptionRow): Subscription {
  if (!isSubscriptionStatus(row.status)) {
    throw new InvalidStatusError(row.status);
  }

  const rules = (row.notification_rules ?? []).map((rule) => {
    if (!isNotificationTiming(rule.timing)) {
      throw new InvalidTimingError(rule.timing);
    }
    return new NotificationRule(rule.id, rule.timing, rule.is_enabled);
  });

  const events = [...(row.renewal_events ?? [])]
    .sort((a, b) => a.position - b.position)
    .map(
      (event) =>
        new RenewalEvent(
          event.id,
          event.subscription_id,
          parseDate(event.renewal_date),
          Money.of(Number(event.amount_amount), event.amount_currency),
          event.is_processed,
        ),
    );

  return Subscription.restore({
    id: row.id,
    name: row.name,
    provider: providerFromRow(row.provider),
    cost: Money.of(Number(row.cost_amount), row.cost_currency),
    billingCycle: BillingCycle.of(row.billing_interval, row.billing_unit),
    status: row.status,
    startDate: parseDate(row.start_date),
    nextBillingDate: parseDate(row.next_billing_date),
    cancellationDate: row.cancellation_date ? parseDate(row.cancellation_date) : null,
    notes: row.notes,
    notificationRules: rules,
    renewalEvents: events,
  });
}

export class SupabaseSubscriptionRepository implements SubscriptionRepository {
  constructor(private readonly client: SupabaseClient) {}

  async findById(subscriptionId: string): Promise<Subscription | null> {
    const { data, error } = await this.client
      .from('subscriptions')
      .select(SUBSCRIPTION_SELECT)
      .eq('id', subscriptionId)
      .maybeSingle();

    assertNoError(error, 'Failed to fetch subscription', { subscriptionId });

    const row: SubscriptionRow | null = data;
    return row ? subscriptionFromRow(row) : null;
  }

  async findAll(): Promise<Subscription[]> {
    const { data, error } = await this.client.from('subscriptions').select(SUBSCRIPTION_SELECT).order('name');

    assertNoError(error, 'Failed to fetch subscriptions', {});
    return this.toSubscriptions(data);
  }

  async findActive(): Promise<Subscription[]> {
    const { data, error } = await this.client
      .from('subscriptions')
      .select(SUBSCRIPTION_SELECT)
      .eq('status', 'active')
      .order('name');

    assertNoError(error, 'Failed to fetch active subscriptions', {});
    return this.toSubscriptions(data);
  }

  async findByProvider(providerId: string): Promise<Subscription[]> {
    const { data, error } = await this.client
      .from('subscriptions')
      .select(SUBSCRIPTION_SELECT)
      .eq('provider_id', providerId)
      .order('name');

    assertNoError(error, 'Failed to fetch subscriptions for provider', { providerId });
    return this.toSubscriptions(data);
  }

  /**
   * Upserts the subscription row and its children, then removes child rows
   * the aggregate no longer holds.
   */
  async save(subscription: Subscription): Promise<void> {
    const snapshot = subscription.toSnapshot();
    const now = new Date().toISOString();

    const { error: subscriptionError } = await this.client.from('subscriptions').upsert({
      id: snapshot.id,
      name: snapshot.name,
      provider_id: snapshot.provider.id,
      cost_amount: snapshot.cost.amount,
      cost_currency: snapshot.cost.currency,
      billing_interval: snapshot.billingCycle.interval,
      billing_unit: snapshot.billingCycle.unit,
      status: snapshot.status,
      start_date: snapshot.startDate,
      next_billing_date: snapshot.nextBillingDate,
      cancellation_date: snapshot.cancellationDate,
      notes: snapshot.notes,
      updated_at: now,
    });
    assertNoError(subscriptionError, 'Failed to save subscription', { subscriptionId: snapshot.id });

    await this.replaceChildren(
      'notification_rules',
      snapshot.id,
      snapshot.notificationRules.map((rule) => ({
        id: rule.id,
        subscription_id: snapshot.id,
        timing: rule.timing,
        is_enabled: rule.isEnabled,
      })),
    );

    await this.replaceChildren(
      'renewal_events',
      snapshot.id,
      snapshot.renewalEvents.map((event, position) => ({
        id: event.id,
        subscription_id: snapshot.id,
        renewal_date: event.renewalDate,
        amount_amount: event.amount.amount,
        amount_currency: event.amount.currency,
        is_processed: event.isProcessed,
        position,
      })),
    );
  }

  async delete(subscriptionId: string): Promise<void> {
    const { error } = await this.client.from('subscriptions').delete().eq('id', subscriptionId);
    assertNoError(error, 'Failed to delete subscription', { subscriptionId });
  }

  private toSubscriptions(data: SubscriptionRow[] | null): Subscription[] {
    return (data ?? []).map((row) => subscriptionFromRow(row));
  }

  private async replaceChildren(
    table: 'notification_rules' | 'renewal_events',
    subscriptionId: string,
    rows: Array<{ id: string }>,
  ): Promise<void> {
    if (rows.length > 0) {
      const { error } = await this.client.from(table).upsert(rows);
      assertNoError(error, `Failed to save ${table}`, { subscriptionId });
    }

    let stale = this.client.from(table).delete().eq('subscription_id', subscriptionId);
    if (rows.length > 0) {
      stale = stale.not('id', 'in', `(${rows.map((row) => row.id).join(',')})`);
    }

    const { error } = await stale;
    assertNoError(error, `Failed to prune ${table}`, { subscriptionId });
  }
}

export class SupabaseProviderRepository implements ProviderRepository {
  constructor(private readonly client: SupabaseClient) {}

  async findById(providerId: string): Promise<Provider | null> {
    const { data, error } = await this.client.from('providers').select('*').eq('id', providerId).maybeSingle();

    assertNoError(error, 'Failed to fetch provider', { providerId });

    const row: ProviderRow | null = data;
    return row ? providerFromRow(row) : null;
  }

  async findByName(name: string): Promise<Provider | null> {
    const { data, error } = await this.client
      .from('providers')
      .select('*')
      .ilike('name', escapeLikePattern(name))
      .limit(1);

    assertNoError(error, 'Failed to fetch provider by name', { name });

    const rows: ProviderRow[] = data ?? [];
    return rows.length > 0 ? providerFromRow(rows[0]) : null;
  }

  async findAll(): Promise<Provider[]> {
    const { data, error } = await this.client.from('providers').select('*').order('name');

    assertNoError(error, 'Failed to fetch providers', {});

    const rows: ProviderRow[] = data ?? [];
    return rows.map((row) => providerFromRow(row));
  }

  async save(provider: Provider): Promise<void> {
    const { error } = await this.client.from('providers').upsert({
      id: provider.id,
      name: provider.name,
      category: provider.category,
      website: provider.website,
      updated_at: new Date().toISOString(),
    });
    assertNoError(error, 'Failed to save provider', { providerId: provider.id });
  }
}

export class SupabaseSubscriptionHistoryRepository implements SubscriptionHistoryRepository {
  constructor(private readonly client: SupabaseClient) {}

  async record(entry: SubscriptionHistoryEntry): Promise<void> {
    const { error } = await this.client.from('subscription_history').insert({
      id: entry.id,
      subscription_id: entry.subscriptionId,
      event_type: entry.eventType,
      description: entry.description,
      created_at: entry.createdAt.toISOString(),
    });
    assertNoError(error, 'Failed to record subscription history', { subscriptionId: entry.subscriptionId });
  }

  async findBySubscription(
    subscriptionId: string,
    limit: number = DEFAULT_HISTORY_LIMIT,
  ): Promise<SubscriptionHistoryEntry[]> {
    const { data, error } = await this.client
      .from('subscription_history')
      .select('*')
      .eq('subscription_id', subscriptionId)
      .order('created_at', { ascending: false })
      .limit(limit);

    assertNoError(error, 'Failed to fetch subscription history', { subscriptionId });

    const rows: HistoryRow[] = data ?? [];
    return rows.map((row) => {
      if (!isHistoryEventType(row.event_type)) {
        throw new Error(`Unknown history event type "${row.event_type}"`);
      }
      return {
        id: row.id,
        subscriptionId: row.subscription_id,
        eventType: row.event_type,
        description: row.description,
        createdAt: parseDate(row.created_at),
      };
    });
  }
}
