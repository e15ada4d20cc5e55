import { ConfigService } from '@nestjs/config';
import { InMemoryCacheService } from './in-memory-cache.service';

describe('InMemoryCacheService', () => {
  let cache: InMemoryCacheService;

  beforeEach(() => {
    cache = new InMemoryCacheService(
      new ConfigService({ cache: { driver: 'memory', max: 2 } }),
    );
  });

  afterEach(() => {
    jest.useRealTimers();
    cache.onModuleDestroy();
  });

  it('round-trips JSON values without sharing references', async () => {
    const value = { id: 7, email: 'a@example.com' };

    await expect(cache.setJson('user:7', value, 60)).resolves.toBe(true);
    value.email = 'changed@example.com';

    await expect(cache.getJson('user:7')).resolves.toEqual({
      id: 7,
      email: 'a@example.com',
    });
  });

  it('expires entries after their TTL', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    await cache.setJson('reset:abc', { used: false }, 30);

    jest.setSystemTime(new Date('2024-01-01T00:00:29Z'));
    await expect(cache.exists('reset:abc')).resolves.toBe(true);

    jest.setSystemTime(new Date('2024-01-01T00:00:31Z'));
    await expect(cache.exists('reset:abc')).resolves.toBe(false);
    await expect(cache.getJson('reset:abc')).resolves.toBeNull();
  });

  it('keeps entries without expiry when the TTL is not positive', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    await cache.setJson('user:1', { id: 1 }, 0);

    jest.setSystemTime(new Date('2030-01-01T00:00:00Z'));
    await expect(cache.getJson('user:1')).resolves.toEqual({ id: 1 });
  });

  it('reports success when deleting an absent key', async () => {
    await expect(cache.delete('user:404')).resolves.toBe(true);
  });

  it('evicts the least recently used entry when full', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    await cache.setJson('a', 1, 60);
    jest.setSystemTime(new Date('2024-01-01T00:00:01Z'));
    await cache.setJson('b', 2, 60);
    jest.setSystemTime(new Date('2024-01-01T00:00:02Z'));
    await cache.getJson('a');

    jest.setSystemTime(new Date('2024-01-01T00:00:03Z'));
    await cache.setJson('c', 3, 60);

    expect(cache.size()).toBe(2);
    await expect(cache.exists('a')).resolves.toBe(true);
    await expect(cache.exists('b')).resolves.toBe(false);
    await expect(cache.exists('c')).resolves.toBe(true);
  });

  it('lets exactly one of two concurrent takes claim a key', async () => {
    await cache.setJson('reset:abc', { used: false }, 60);

    const results = await Promise.all([cache.take('reset:abc'), cache.take('reset:abc')]);

    expect(results.filter(Boolean)).toHaveLength(1);
    await expect(cache.exists('reset:abc')).resolves.toBe(false);
  });

  it('does not claim a missing or expired key', async () => {
    jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00Z') });
    await cache.setJson('reset:old', { used: false }, 30);
    jest.setSystemTime(new Date('2024-01-01T00:00:31Z'));

    await expect(cache.take('reset:old')).resolves.toBe(false);
    await expect(cache.take('reset:never')).resolves.toBe(false);
  });
});
