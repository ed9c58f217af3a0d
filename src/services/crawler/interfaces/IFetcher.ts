import { CrawlKey, FetchResult } from './types';

/**
 * Capability that retrieves a key's content and the keys it links to.
 * No ordering, concurrency or idempotence guarantees are assumed of implementations.
 */
export interface IFetcher {
  /**
   * Fetch a single key
   * @param key The key to fetch
   * @returns The key's content and outbound links
   * @throws FetchNotFoundError when the key has no content
   * @throws FetchTransportError when the source could not be reached
   */
  fetch(key: CrawlKey): Promise<FetchResult>;
}
