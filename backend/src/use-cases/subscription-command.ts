import { v4 as uuidv4 } from 'uuid';
import logger from '../config/logger';
import { NotFoundError } from '../domain/errors';
import type { Subscription } from '../domain/subscription';
import type { SubscriptionHistoryRepository, SubscriptionRepository } from '../repositories/types';
import type { HistoryEventType } from '../types/subscription';
import { KeyedLock } from '../utils/keyed-lock';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface SubscriptionCommandDependencies {
  subscriptionRepository: SubscriptionRepository;
  historyRepository: SubscriptionHistoryRepository;
  lock?: KeyedLock;
  clock?: Clock;
}

export interface HistoryNote {
  eventType: HistoryEventType;
  description: string;
}

export interface Mutation<T> {
  result: T;
  history: HistoryNote | null;
  /** False when apply left the aggregate untouched; the save is skipped. */
  changed?: boolean;
}

export interface MutationResult<T> {
  subscription: Subscription;
  result: T;
}

/**
 * Shared find → mutate → save → audit flow for use cases that change a
 * subscription. Runs under a per-subscription lock so two commands for the
 * same aggregate never interleave inside this process.
 */
export abstract class SubscriptionCommand {
  protected readonly subscriptionRepository: SubscriptionRepository;
  protected readonly historyRepository: SubscriptionHistoryRepository;
  protected readonly lock: KeyedLock;
  protected readonly clock: Clock;

  constructor(deps: SubscriptionCommandDependencies) {
    this.subscriptionRepository = deps.subscriptionRepository;
    this.historyRepository = deps.historyRepository;
    this.lock = deps.lock ?? new KeyedLock();
    this.clock = deps.clock ?? systemClock;
  }

  protected async loadSubscription(subscriptionId: string): Promise<Subscription> {
    const subscription = await this.subscriptionRepository.findById(subscriptionId);
    if (!subscription) {
      throw new NotFoundError('Subscription', subscriptionId);
    }
    return subscription;
  }

  protected async mutate<T>(
    subscriptionId: string,
    apply: (subscription: Subscription, now: Date) => Mutation<T>,
  ): Promise<MutationResult<T>> {
    return this.lock.run(subscriptionId, async () => {
      const subscription = await this.loadSubscription(subscriptionId);
      const now = this.clock();
      const { result, history, changed = true } = apply(subscription, now);

      if (!changed) {
        return { subscription, result };
      }

      await this.subscriptionRepository.save(subscription);

      if (history) {
        await this.recordHistory(subscription.id, history, now);
        logger.info(history.description, { subscriptionId: subscription.id });
      }

      return { subscription, result };
    });
  }

  protected async recordHistory(subscriptionId: string, note: HistoryNote, at: Date): Promise<void> {
    await this.historyRepository.record({
      id: uuidv4(),
      subscriptionId,
      eventType: note.eventType,
      description: note.description,
      createdAt: at,
    });
  }
}
