import { IFetcher } from '../interfaces/IFetcher';
import { IResultCache } from '../interfaces/IResultCache';
import { CrawlKey, FetchResult } from '../interfaces/types';

/**
 * Fetcher decorator that routes every fetch through a shared result cache
 */
export class CachingFetcher implements IFetcher {
  constructor(
    private readonly inner: IFetcher,
    private readonly cache: IResultCache
  ) {}

  fetch(key: CrawlKey): Promise<FetchResult> {
    return this.cache.getOrFetch(key, this.inner);
  }
}
