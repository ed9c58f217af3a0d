import { AppConfig } from '../config';
import logger from '../utils/logger';
import { ICrawler } from './crawler/interfaces/ICrawler';
import { IFetcher } from './crawler/interfaces/IFetcher';
import { IResultCache } from './crawler/interfaces/IResultCache';
import { CacheStats, CrawlKey, CrawlRunOptions, CrawlSummary } from './crawler/interfaces/types';
import { AsyncChannel } from './crawler/implementations/AsyncChannel';
import { CrawlerFactory, FetcherSource } from './crawler/factories/CrawlerFactory';
import { toError } from './crawler/errors';

export interface CrawlServiceOptions {
  /** Capacity of the output stream; unbounded when omitted */
  streamCapacity?: number;
}

export interface CollectedCrawl {
  visited: CrawlKey[];
  summary: CrawlSummary;
}

type RunOutcome =
  | { ok: true; summary: CrawlSummary }
  | { ok: false; error: Error };

/**
 * Runs crawls end to end: creates the output stream, starts the crawler and
 * drains the stream into the caller's callback.
 */
export class CrawlService {
  private readonly streamCapacity: number;

  constructor(
    private readonly crawler: ICrawler,
    private readonly fetcher: IFetcher,
    private readonly cache?: IResultCache,
    options: CrawlServiceOptions = {}
  ) {
    this.streamCapacity = options.streamCapacity ?? Infinity;
  }

  /**
   * Build a service from application configuration
   * @param overrides Source and dataset to use instead of the configured ones
   */
  static async fromConfig(
    config: AppConfig,
    overrides: { source?: FetcherSource; datasetPath?: string } = {}
  ): Promise<CrawlService> {
    const factory = new CrawlerFactory(config.crawler, config.http);
    const cache = factory.createResultCache();
    const source = await factory.createSourceFetcher(overrides.source, overrides.datasetPath);

    return new CrawlService(
      factory.createCrawler(),
      factory.createCachingFetcher(source, cache),
      cache,
      { streamCapacity: config.crawler.streamCapacity }
    );
  }

  /**
   * Crawl and hand every visited key to a callback as it arrives.
   * If the callback throws, the rest of the run is cancelled and drained,
   * and the callback's error is rethrown.
   */
  async crawl(
    rootKey: CrawlKey,
    maxDepth: number,
    onVisit: (key: CrawlKey) => void | Promise<void>,
    options: CrawlRunOptions = {}
  ): Promise<CrawlSummary> {
    const channel = new AsyncChannel<CrawlKey>(this.streamCapacity);
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const outcome: Promise<RunOutcome> = this.crawler
      .crawl(rootKey, maxDepth, this.fetcher, channel, { ...options, signal: controller.signal })
      .then(
        summary => ({ ok: true as const, summary }),
        (error: unknown) => {
          // the run may fail before the coordinator ever closes the stream
          if (!channel.closed) {
            channel.close();
          }
          return { ok: false as const, error: toError(error) };
        }
      );

    let consumerError: Error | undefined;
    for await (const key of channel) {
      if (consumerError) {
        continue;
      }
      try {
        await onVisit(key);
      } catch (error) {
        consumerError = toError(error);
        logger.error(`Visitor failed on ${key}, cancelling crawl: ${consumerError.message}`);
        controller.abort();
      }
    }

    const result = await outcome;
    options.signal?.removeEventListener('abort', forwardAbort);

    if (consumerError) {
      throw consumerError;
    }
    if (!result.ok) {
      throw result.error;
    }
    return result.summary;
  }

  /**
   * Crawl and return every visited key in emission order
   */
  async collect(rootKey: CrawlKey, maxDepth: number, options: CrawlRunOptions = {}): Promise<CollectedCrawl> {
    const visited: CrawlKey[] = [];
    const summary = await this.crawl(rootKey, maxDepth, key => {
      visited.push(key);
    }, options);
    return { visited, summary };
  }

  getCacheStats(): CacheStats | null {
    return this.cache ? this.cache.getStats() : null;
  }
}
