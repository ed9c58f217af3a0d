import { InMemoryResultCache } from '../InMemoryResultCache';
import { IFetcher } from '../../interfaces/IFetcher';
import { CacheLockingMode, FetchResult } from '../../interfaces/types';
import { CacheContentionError, FetchTransportError } from '../../errors';
import { DelayUtils } from '../../utils/DelayUtils';

function createFetcher(latencyMs = 0) {
  return {
    fetch: jest.fn(async (key: string): Promise<FetchResult> => {
      if (latencyMs > 0) {
        await DelayUtils.delay(latencyMs);
      }
      return { content: `body of ${key}`, links: [`${key}/child`] };
    })
  };
}

describe('InMemoryResultCache', () => {
  let cache: InMemoryResultCache;

  beforeEach(() => {
    cache = new InMemoryResultCache();
  });

  it('should default to per-key locking', () => {
    expect(cache.lockingMode).toBe('per-key');
  });

  it('should fetch on a miss and serve the identical result on a hit', async () => {
    const fetcher = createFetcher();

    const first = await cache.getOrFetch('a', fetcher);
    const second = await cache.getOrFetch('a', fetcher);

    expect(first).toEqual({ content: 'body of a', links: ['a/child'] });
    expect(second).toBe(first);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ entries: 1, hits: 1, misses: 1, fetches: 1, failures: 0 });
  });

  it('should store frozen copies of fetched results', async () => {
    const links = ['b'];
    const fetcher: IFetcher = { fetch: async () => ({ content: 'a', links }) };

    const result = await cache.getOrFetch('a', fetcher);
    links.push('c');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.links)).toBe(true);
    expect(result.links).toEqual(['b']);
  });

  it.each<CacheLockingMode>(['global', 'per-key'])(
    'should fetch a key once under concurrent first requests (%s locking)',
    async locking => {
      cache = new InMemoryResultCache({ locking });
      const fetcher = createFetcher(10);

      const results = await Promise.all(
        Array.from({ length: 5 }, () => cache.getOrFetch('a', fetcher))
      );

      expect(fetcher.fetch).toHaveBeenCalledTimes(1);
      for (const result of results) {
        expect(result).toBe(results[0]);
      }
      expect(cache.getStats()).toEqual({ entries: 1, hits: 4, misses: 1, fetches: 1, failures: 0 });
    }
  );

  it('should not cache failures and retry them on the next request', async () => {
    const fetch = jest.fn<Promise<FetchResult>, [string]>()
      .mockRejectedValueOnce(new FetchTransportError('a', 'connection reset'))
      .mockResolvedValueOnce({ content: 'ok', links: [] });

    await expect(cache.getOrFetch('a', { fetch })).rejects.toBeInstanceOf(FetchTransportError);
    expect(cache.has('a')).toBe(false);

    await expect(cache.getOrFetch('a', { fetch })).resolves.toEqual({ content: 'ok', links: [] });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(cache.getStats()).toEqual({ entries: 1, hits: 0, misses: 2, fetches: 2, failures: 1 });
  });

  describe('locking modes', () => {
    async function maxParallelFetches(locking: CacheLockingMode): Promise<number> {
      const lockingCache = new InMemoryResultCache({ locking });
      let inFlight = 0;
      let maxInFlight = 0;
      const fetcher: IFetcher = {
        fetch: async key => {
          inFlight += 1;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await DelayUtils.delay(10);
          inFlight -= 1;
          return { content: key, links: [] };
        }
      };

      await Promise.all(['a', 'b', 'c'].map(key => lockingCache.getOrFetch(key, fetcher)));
      return maxInFlight;
    }

    it('should fetch distinct keys in parallel with per-key locking', async () => {
      await expect(maxParallelFetches('per-key')).resolves.toBe(3);
    });

    it('should serialize every fetch with global locking', async () => {
      await expect(maxParallelFetches('global')).resolves.toBe(1);
    });
  });

  it('should raise CacheContentionError when the lock wait exceeds the bound', async () => {
    cache = new InMemoryResultCache({ lockTimeoutMs: 10 });
    const fetcher = createFetcher(50);

    const first = cache.getOrFetch('a', fetcher);
    await expect(cache.getOrFetch('a', fetcher)).rejects.toBeInstanceOf(CacheContentionError);

    await expect(first).resolves.toEqual({ content: 'body of a', links: ['a/child'] });
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
  });

  it('should peek without fetching', async () => {
    const fetcher = createFetcher();
    expect(cache.peek('a')).toBeUndefined();

    const result = await cache.getOrFetch('a', fetcher);
    expect(cache.peek('a')).toBe(result);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
  });

  it('should forget entries and statistics on clear', async () => {
    const fetcher = createFetcher();
    await cache.getOrFetch('a', fetcher);

    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.getStats()).toEqual({ entries: 0, hits: 0, misses: 0, fetches: 0, failures: 0 });

    await cache.getOrFetch('a', fetcher);
    expect(fetcher.fetch).toHaveBeenCalledTimes(2);
  });
});
