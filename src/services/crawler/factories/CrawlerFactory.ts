import { CrawlerConfig, HttpConfig } from '../../../config';
import { ICrawler } from '../interfaces/ICrawler';
import { IFetcher } from '../interfaces/IFetcher';
import { IResultCache } from '../interfaces/IResultCache';
import { CachingFetcher } from '../implementations/CachingFetcher';
import { HttpFetcher } from '../implementations/HttpFetcher';
import { InMemoryResultCache } from '../implementations/InMemoryResultCache';
import { RecursiveCrawler } from '../implementations/RecursiveCrawler';
import { StaticFetcher } from '../implementations/StaticFetcher';
import { LoggingUtils } from '../utils/LoggingUtils';

export type FetcherSource = CrawlerConfig['source'];

/**
 * Builds the crawler's collaborators from configuration.
 * Every call returns fresh instances; nothing is shared between factories.
 */
export class CrawlerFactory {
  private readonly logger = LoggingUtils.createTaggedLogger('crawler');

  constructor(
    private readonly crawlerConfig: CrawlerConfig,
    private readonly httpConfig: HttpConfig
  ) {}

  createResultCache(): IResultCache {
    return new InMemoryResultCache({
      locking: this.crawlerConfig.cacheLocking,
      lockTimeoutMs: this.crawlerConfig.lockTimeoutMs
    });
  }

  /**
   * Create the fetcher that actually retrieves pages
   * @param source Overrides the configured source
   * @param datasetPath Overrides the configured dataset for the static source
   */
  async createSourceFetcher(source: FetcherSource = this.crawlerConfig.source, datasetPath?: string): Promise<IFetcher> {
    if (source === 'http') {
      this.logger.debug('Using HTTP fetcher');
      return new HttpFetcher({
        userAgent: this.httpConfig.userAgent,
        timeout: this.httpConfig.timeout,
        maxRetries: this.httpConfig.maxRetries,
        retryDelay: this.httpConfig.retryDelay,
        sameDomainOnly: this.httpConfig.sameDomainOnly
      });
    }

    const path = datasetPath ?? this.crawlerConfig.datasetPath;
    this.logger.debug(`Using static fetcher with dataset ${path}`);
    return StaticFetcher.fromFile(path);
  }

  createCachingFetcher(inner: IFetcher, cache: IResultCache = this.createResultCache()): IFetcher {
    return new CachingFetcher(inner, cache);
  }

  createCrawler(): ICrawler {
    return new RecursiveCrawler({ dedupeTraversal: this.crawlerConfig.dedupeTraversal });
  }
}
