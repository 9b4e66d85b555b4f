import { Provider } from '../domain/provider';
import { Subscription } from '../domain/subscription';
import type { ProviderSnapshot, SubscriptionHistoryEntry, SubscriptionSnapshot } from '../types/subscription';
import {
  DEFAULT_HISTORY_LIMIT,
  type ProviderRepository,
  type SubscriptionHistoryRepository,
  type SubscriptionRepository,
} from './types';

/**
 * Map-backed store for local runs and tests. Aggregates are stored as
 * snapshots, so every read returns a fresh instance, as a database would.
 */
export class InMemorySubscriptionRepository implements SubscriptionRepository {
  private readonly subscriptions = new Map<string, SubscriptionSnapshot>();

  async findById(subscriptionId: string): Promise<Subscription | null> {
    const snapshot = this.subscriptions.get(subscriptionId);
    return snapshot ? Subscription.fromSnapshot(snapshot) : null;
  }

  async findAll(): Promise<Subscription[]> {
    return [...this.subscriptions.values()].map((snapshot) => Subscription.fromSnapshot(snapshot));
  }

  async findActive(): Promise<Subscription[]> {
    return (await this.findAll()).filter((subscription) => subscription.isActive());
  }

  async findByProvider(providerId: string): Promise<Subscription[]> {
    return (await this.findAll()).filter((subscription) => subscription.provider.id === providerId);
  }

  async save(subscription: Subscription): Promise<void> {
    this.subscriptions.set(subscription.id, subscription.toSnapshot());
  }

  async delete(subscriptionId: string): Promise<void> {
    this.subscriptions.delete(subscriptionId);
  }
}

export class InMemoryProviderRepository implements ProviderRepository {
  private readonly providers = new Map<string, ProviderSnapshot>();

  async findById(providerId: string): Promise<Provider | null> {
    const snapshot = this.providers.get(providerId);
    return snapshot ? Provider.fromSnapshot(snapshot) : null;
  }

  async findByName(name: string): Promise<Provider | null> {
    const wanted = name.toLowerCase();
    for (const snapshot of this.providers.values()) {
      if (snapshot.name.toLowerCase() === wanted) {
        return Provider.fromSnapshot(snapshot);
      }
    }
    return null;
  }

  async findAll(): Promise<Provider[]> {
    return [...this.providers.values()].map((snapshot) => Provider.fromSnapshot(snapshot));
  }

  async save(provider: Provider): Promise<void> {
    this.providers.set(provider.id, provider.toJSON());
  }
}

export class InMemorySubscriptionHistoryRepository implements SubscriptionHistoryRepository {
  private readonly entries: SubscriptionHistoryEntry[] = [];

  async record(entry: SubscriptionHistoryEntry): Promise<void> {
    this.entries.push({ ...entry, createdAt: new Date(entry.createdAt.getTime()) });
  }

  async findBySubscription(
    subscriptionId: string,
    limit: number = DEFAULT_HISTORY_LIMIT,
  ): Promise<SubscriptionHistoryEntry[]> {
    return this.entries
      .filter((entry) => entry.subscriptionId === subscriptionId)
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((entry) => ({ ...entry, createdAt: new Date(entry.createdAt.getTime()) }));
  }
}
