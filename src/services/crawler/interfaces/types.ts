/**
 * Common types for the crawler service
 */

/**
 * Identifier of a crawlable unit (a URL in practice). Compared by exact value.
 */
export type CrawlKey = string;

/**
 * Content and outbound links of a successfully fetched key
 */
export interface FetchResult {
  readonly content: string;
  readonly links: readonly CrawlKey[];
}

/**
 * Terminal state of a single crawl task
 */
export enum CrawlTaskOutcome {
  PRUNED = 'pruned',
  FETCH_FAILED = 'fetch-failed',
  CANCELLED = 'cancelled',
  SKIPPED = 'skipped',
  EXPANDED = 'expanded'
}

/**
 * Locking discipline of the result cache
 */
export type CacheLockingMode = 'global' | 'per-key';

export interface ResultCacheOptions {
  locking?: CacheLockingMode;
  /** Give up waiting for a lock after this many milliseconds */
  lockTimeoutMs?: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  fetches: number;
  failures: number;
}

/**
 * Per-run options for the crawler
 */
export interface CrawlRunOptions {
  /** Aborting the signal moves every task that has not fetched yet to the cancelled state */
  signal?: AbortSignal;
  /**
   * Expand a key again only when it is reached with more depth left than any
   * earlier expansion in the run. Failed fetches release their claim.
   */
  dedupeTraversal?: boolean;
  /** Observer for fetch failures; the crawl continues regardless */
  onError?: (key: CrawlKey, error: Error, depth: number) => void;
}

export interface CrawlFailure {
  key: CrawlKey;
  depth: number;
  error: Error;
}

export interface CrawlSummary {
  rootKey: CrawlKey;
  maxDepth: number;
  emitted: number;
  pruned: number;
  failed: number;
  cancelled: number;
  skipped: number;
  failures: CrawlFailure[];
  durationMs: number;
}

/**
 * Page description accepted by the static fetcher
 */
export interface StaticPage {
  body: string;
  links: CrawlKey[];
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeout?: number;
  maxRedirects?: number;
  maxRetries?: number;
  retryDelay?: number;
  sameDomainOnly?: boolean;
}
