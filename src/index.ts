export * from './services/crawler/interfaces/types';
export { IFetcher } from './services/crawler/interfaces/IFetcher';
export { IResultCache } from './services/crawler/interfaces/IResultCache';
export { IOutputStream } from './services/crawler/interfaces/IOutputStream';
export { ICrawler } from './services/crawler/interfaces/ICrawler';
export { ILinkExtractor } from './services/crawler/interfaces/ILinkExtractor';
export * from './services/crawler/errors';
export { AsyncChannel } from './services/crawler/implementations/AsyncChannel';
export { CachingFetcher } from './services/crawler/implementations/CachingFetcher';
export { CompletionCoordinator } from './services/crawler/implementations/CompletionCoordinator';
export { HtmlLinkExtractor } from './services/crawler/implementations/HtmlLinkExtractor';
export { HttpFetcher } from './services/crawler/implementations/HttpFetcher';
export { InMemoryResultCache } from './services/crawler/implementations/InMemoryResultCache';
export { RecursiveCrawler } from './services/crawler/implementations/RecursiveCrawler';
export { StaticFetcher, StaticFetcherOptions } from './services/crawler/implementations/StaticFetcher';
export { CrawlerFactory, FetcherSource } from './services/crawler/factories/CrawlerFactory';
export { KeyedMutex, LockTimeoutError, Mutex, Release } from './services/crawler/utils/Mutex';
export { LoggingUtils, LogLevel, TaggedLogger } from './services/crawler/utils/LoggingUtils';
export { CrawlService, CrawlServiceOptions, CollectedCrawl } from './services/crawl.service';
export { loadConfig, AppConfig, CrawlerConfig, HttpConfig } from './config';
