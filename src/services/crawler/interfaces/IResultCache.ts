import { IFetcher } from './IFetcher';
import { CacheStats, CrawlKey, FetchResult } from './types';

/**
 * Interface for the shared fetch-result cache.
 * Implementations guarantee that a key is fetched through the underlying
 * fetcher at most once for the cache's lifetime, however many callers ask
 * for it concurrently. Failures are never stored.
 */
export interface IResultCache {
  /**
   * Return the stored result for a key, fetching and storing it on a miss
   * @param key The key to look up
   * @param fetcher Fetcher used on a miss
   */
  getOrFetch(key: CrawlKey, fetcher: IFetcher): Promise<FetchResult>;

  has(key: CrawlKey): boolean;

  /**
   * Read a stored result without fetching or locking
   */
  peek(key: CrawlKey): FetchResult | undefined;

  readonly size: number;

  /**
   * Drop every stored result and reset the statistics
   */
  clear(): void;

  getStats(): CacheStats;
}
