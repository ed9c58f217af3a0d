import { join } from 'path';
import { CrawlerFactory } from '../CrawlerFactory';
import { loadConfig } from '../../../../config';
import { CachingFetcher } from '../../implementations/CachingFetcher';
import { HttpFetcher } from '../../implementations/HttpFetcher';
import { InMemoryResultCache } from '../../implementations/InMemoryResultCache';
import { RecursiveCrawler } from '../../implementations/RecursiveCrawler';
import { StaticFetcher } from '../../implementations/StaticFetcher';

const SAMPLE_DATASET = join(__dirname, '../../../../../data/sample-site.json');

describe('CrawlerFactory', () => {
  let factory: CrawlerFactory;

  beforeEach(() => {
    const config = loadConfig({
      CRAWL_CACHE_LOCKING: 'global',
      CRAWL_DATASET_PATH: SAMPLE_DATASET
    });
    factory = new CrawlerFactory(config.crawler, config.http);
  });

  it('should create a result cache with the configured locking mode', () => {
    const cache = factory.createResultCache();

    expect(cache).toBeInstanceOf(InMemoryResultCache);
    expect(cache instanceof InMemoryResultCache && cache.lockingMode).toBe('global');
  });

  it('should create a fresh cache on every call', () => {
    expect(factory.createResultCache()).not.toBe(factory.createResultCache());
  });

  it('should load the configured dataset for the static source', async () => {
    const fetcher = await factory.createSourceFetcher();

    expect(fetcher).toBeInstanceOf(StaticFetcher);
    await expect(fetcher.fetch('http://golang.org/pkg/fmt/')).resolves.toEqual({
      content: 'Package fmt',
      links: ['http://golang.org/', 'http://golang.org/pkg/']
    });
  });

  it('should create an HTTP fetcher when asked for the http source', async () => {
    await expect(factory.createSourceFetcher('http')).resolves.toBeInstanceOf(HttpFetcher);
  });

  it('should wrap a fetcher in a caching decorator', async () => {
    const inner = new StaticFetcher({ a: { body: 'A', links: [] } });
    const cache = factory.createResultCache();

    const fetcher = factory.createCachingFetcher(inner, cache);
    await fetcher.fetch('a');

    expect(fetcher).toBeInstanceOf(CachingFetcher);
    expect(cache.has('a')).toBe(true);
  });

  it('should create a recursive crawler', () => {
    expect(factory.createCrawler()).toBeInstanceOf(RecursiveCrawler);
  });
});
