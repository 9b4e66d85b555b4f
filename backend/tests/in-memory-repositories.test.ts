import { Provider } from '../src/domain/provider';
import {
  InMemoryProviderRepository,
  InMemorySubscriptionHistoryRepository,
  InMemorySubscriptionRepository,
} from '../src/repositories/in-memory';
import { makeProvider, makeSubscription, utc } from './helpers/fixtures';

describe('in-memory repositories', () => {
  describe('InMemorySubscriptionRepository', () => {
    it('should return a fresh instance on every read', async () => {
      const repository = new InMemorySubscriptionRepository();
      const subscription = makeSubscription({ id: 'sub-1' });
      await repository.save(subscription);

      const loaded = await repository.findById('sub-1');
      loaded?.pause();

      expect(loaded).not.toBe(subscription);
      expect((await repository.findById('sub-1'))?.status).toBe('active');
    });

    it('should not see changes until saved', async () => {
      const repository = new InMemorySubscriptionRepository();
      const subscription = makeSubscription({ id: 'sub-1' });
      await repository.save(subscription);

      subscription.pause();
      expect((await repository.findActive()).map((found) => found.id)).toEqual(['sub-1']);

      await repository.save(subscription);
      expect(await repository.findActive()).toEqual([]);
    });

    it('should filter by provider and delete by id', async () => {
      const repository = new InMemorySubscriptionRepository();
      await repository.save(makeSubscription({ id: 'sub-1' }));
      await repository.save(makeSubscription({ id: 'sub-2', provider: makeProvider('Spotify', 'Music') }));

      expect((await repository.findByProvider('provider-spotify')).map((found) => found.id)).toEqual(['sub-2']);

      await repository.delete('sub-2');
      expect((await repository.findAll()).map((found) => found.id)).toEqual(['sub-1']);
      expect(await repository.findById('sub-2')).toBeNull();
    });
  });

  describe('InMemoryProviderRepository', () => {
    it('should find providers by name ignoring case', async () => {
      const repository = new InMemoryProviderRepository();
      await repository.save(new Provider('provider-1', 'Netflix', 'Streaming', 'https://example.com'));

      const found = await repository.findByName('NETFLIX');
      expect(found?.id).toBe('provider-1');
      expect(found?.website).toBe('https://example.com');
      expect(await repository.findByName('Hulu')).toBeNull();
    });
  });

  describe('InMemorySubscriptionHistoryRepository', () => {
    it('should return entries newest first, limited', async () => {
      const repository = new InMemorySubscriptionHistoryRepository();
      const record = (id: string, day: string) =>
        repository.record({
          id,
          subscriptionId: 'sub-1',
          eventType: 'updated',
          description: id,
          createdAt: utc(day),
        });

      await record('a', '2026-01-01');
      await record('b', '2026-01-03');
      await record('c', '2026-01-02');
      await record('d', '2026-01-03');
      await repository.record({
        id: 'other',
        subscriptionId: 'sub-2',
        eventType: 'created',
        description: 'other',
        createdAt: utc('2026-01-04'),
      });

      const entries = await repository.findBySubscription('sub-1');
      expect(entries.map((entry) => entry.id)).toEqual(['d', 'b', 'c', 'a']);

      const limited = await repository.findBySubscription('sub-1', 2);
      expect(limited.map((entry) => entry.id)).toEqual(['d', 'b']);
    });
  });
});
