import type { Provider } from '../domain/provider';
import type { Subscription } from '../domain/subscription';
import type { SubscriptionHistoryEntry } from '../types/subscription';

export const DEFAULT_HISTORY_LIMIT = 20;

/**
 * Storage contract for the Subscription aggregate. Implementations persist the
 * whole aggregate (rules and renewal events included) on `save`.
 */
export interface SubscriptionRepository {
  findById(subscriptionId: string): Promise<Subscription | null>;
  findAll(): Promise<Subscription[]>;
  findActive(): Promise<Subscription[]>;
  findByProvider(providerId: string): Promise<Subscription[]>;
  save(subscription: Subscription): Promise<void>;
  delete(subscriptionId: string): Promise<void>;
}

export interface ProviderRepository {
  findById(providerId: string): Promise<Provider | null>;
  /** Case-insensitive exact match. */
  findByName(name: string): Promise<Provider | null>;
  findAll(): Promise<Provider[]>;
  save(provider: Provider): Promise<void>;
}

export interface SubscriptionHistoryRepository {
  record(entry: SubscriptionHistoryEntry): Promise<void>;
  /** Newest first. */
  findBySubscription(subscriptionId: string, limit?: number): Promise<SubscriptionHistoryEntry[]>;
}
