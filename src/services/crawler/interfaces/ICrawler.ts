import { IFetcher } from './IFetcher';
import { IOutputStream } from './IOutputStream';
import { CrawlKey, CrawlRunOptions, CrawlSummary } from './types';

/**
 * Interface for crawler implementations.
 */
export interface ICrawler {
  /**
   * Crawl from a root key down to a maximum depth, writing every visited key
   * to the output stream and closing it once the whole task tree has finished.
   * The caller owns the stream and must drain it while the crawl runs.
   * @param rootKey Key to start from
   * @param maxDepth Non-negative recursion budget; 0 visits nothing
   * @param fetcher Fetch capability, typically a caching one
   * @param output Stream receiving visited keys
   * @param options Per-run options
   * @returns Counts of the run's terminal task states
   */
  crawl(
    rootKey: CrawlKey,
    maxDepth: number,
    fetcher: IFetcher,
    output: IOutputStream<CrawlKey>,
    options?: CrawlRunOptions
  ): Promise<CrawlSummary>;
}
