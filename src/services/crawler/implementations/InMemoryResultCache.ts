import { IFetcher } from '../interfaces/IFetcher';
import { IResultCache } from '../interfaces/IResultCache';
import { CacheLockingMode, CacheStats, CrawlKey, FetchResult, ResultCacheOptions } from '../interfaces/types';
import { CacheContentionError } from '../errors';
import { KeyedMutex, LockTimeoutError, Mutex, Release } from '../utils/Mutex';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * In-memory implementation of the result cache.
 *
 * The lock for a key is held across the underlying fetch, so concurrent
 * first requests for the same key queue up behind one fetch instead of each
 * issuing their own. In `per-key` mode distinct keys still fetch in parallel;
 * in `global` mode every lookup is serialized.
 */
export class InMemoryResultCache implements IResultCache {
  private results: Map<CrawlKey, FetchResult> = new Map();
  private readonly globalLock = new Mutex();
  private readonly keyLocks = new KeyedMutex<CrawlKey>();
  private readonly locking: CacheLockingMode;
  private readonly lockTimeoutMs?: number;
  private readonly logger = LoggingUtils.createTaggedLogger('cache');
  private stats = { hits: 0, misses: 0, fetches: 0, failures: 0 };

  constructor(options: ResultCacheOptions = {}) {
    this.locking = options.locking ?? 'per-key';
    this.lockTimeoutMs = options.lockTimeoutMs;
  }

  async getOrFetch(key: CrawlKey, fetcher: IFetcher): Promise<FetchResult> {
    const release = await this.acquire(key);

    try {
      const cached = this.results.get(key);
      if (cached) {
        this.stats.hits += 1;
        this.logger.debug(`Cache hit: ${key}`);
        return cached;
      }

      this.stats.misses += 1;
      this.stats.fetches += 1;
      this.logger.debug(`Cache miss: ${key}`);

      let result: FetchResult;
      try {
        result = await fetcher.fetch(key);
      } catch (error) {
        this.stats.failures += 1;
        throw error;
      }

      const stored = freezeResult(result);
      this.results.set(key, stored);
      return stored;
    } finally {
      release();
    }
  }

  has(key: CrawlKey): boolean {
    return this.results.has(key);
  }

  peek(key: CrawlKey): FetchResult | undefined {
    return this.results.get(key);
  }

  get size(): number {
    return this.results.size;
  }

  get lockingMode(): CacheLockingMode {
    return this.locking;
  }

  clear(): void {
    this.results.clear();
    this.stats = { hits: 0, misses: 0, fetches: 0, failures: 0 };
    this.logger.debug('Result cache cleared');
  }

  getStats(): CacheStats {
    return { entries: this.results.size, ...this.stats };
  }

  private async acquire(key: CrawlKey): Promise<Release> {
    try {
      return this.locking === 'global'
        ? await this.globalLock.acquire(this.lockTimeoutMs)
        : await this.keyLocks.acquire(key, this.lockTimeoutMs);
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        this.logger.warn(`Lock contention on ${key}: gave up after ${error.timeoutMs}ms`);
        throw new CacheContentionError(key, error.timeoutMs);
      }
      throw error;
    }
  }
}

function freezeResult(result: FetchResult): FetchResult {
  return Object.freeze({
    content: result.content,
    links: Object.freeze([...result.links])
  });
}
