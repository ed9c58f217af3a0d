#!/usr/bin/env node
/**
 * Crawl CLI
 *
 * Crawls from a root URL down to a maximum depth and prints every visited
 * URL as soon as it is discovered. Pages come from a static JSON dataset by
 * default, or from the network with `--source http`.
 *
 * @example
 * ```
 * npm start -- --url http://golang.org/ --max-depth 3
 * npm start -- --url https://example.com/ --source http --max-depth 2 --capacity 8
 * ```
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config from '../config';
import logger from '../utils/logger';
import { CrawlService } from '../services/crawl.service';
import { CacheLockingMode } from '../services/crawler/interfaces/types';
import { FetcherSource } from '../services/crawler/factories/CrawlerFactory';
import { LoggingUtils, LogLevel } from '../services/crawler/utils/LoggingUtils';

const SOURCES: readonly FetcherSource[] = ['static', 'http'];
const LOCKING_MODES: readonly CacheLockingMode[] = ['per-key', 'global'];

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('depth-crawler')
    .usage('Usage: $0 [options]')
    .option('url', {
      alias: 'u',
      type: 'string',
      description: 'Root URL to start crawling from',
      default: config.crawler.rootUrl
    })
    .option('max-depth', {
      alias: 'd',
      type: 'number',
      description: 'Maximum crawl depth (0 visits nothing)',
      default: config.crawler.maxDepth
    })
    .option('source', {
      choices: SOURCES,
      description: 'Where pages are fetched from',
      default: config.crawler.source
    })
    .option('dataset', {
      type: 'string',
      description: 'JSON dataset used by the static source',
      default: config.crawler.datasetPath
    })
    .option('capacity', {
      type: 'number',
      description: 'Output stream capacity (unbounded when omitted)'
    })
    .option('locking', {
      choices: LOCKING_MODES,
      description: 'Result cache locking mode',
      default: config.crawler.cacheLocking
    })
    .option('dedupe', {
      type: 'boolean',
      description: 'Expand each URL at most once per run',
      default: config.crawler.dedupeTraversal
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description: 'Log cache and fetch activity',
      default: false
    })
    .check(args => {
      if (!Number.isInteger(args['max-depth']) || args['max-depth'] < 0) {
        throw new Error('--max-depth must be a non-negative integer');
      }
      if (args.capacity !== undefined && (!Number.isInteger(args.capacity) || args.capacity < 0)) {
        throw new Error('--capacity must be a non-negative integer');
      }
      return true;
    })
    .strict()
    .help()
    .parseAsync();

  if (argv.verbose) {
    logger.level = 'debug';
  } else {
    LoggingUtils.setLogLevel(LogLevel.WARN);
  }

  const service = await CrawlService.fromConfig(
    {
      ...config,
      crawler: {
        ...config.crawler,
        cacheLocking: argv.locking,
        dedupeTraversal: argv.dedupe,
        streamCapacity: argv.capacity ?? config.crawler.streamCapacity
      }
    },
    { source: argv.source, datasetPath: argv.dataset }
  );

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, cancelling outstanding fetches');
    controller.abort();
  });

  const summary = await service.crawl(argv.url, argv['max-depth'], key => {
    console.log(`Visited URL: ${key}`);
  }, { signal: controller.signal });

  const cacheStats = service.getCacheStats();
  console.log(
    `\nVisited ${summary.emitted} URLs in ${summary.durationMs}ms ` +
    `(${summary.failed} failed, ${summary.pruned} pruned, ${summary.cancelled} cancelled, ${summary.skipped} skipped)`
  );
  if (cacheStats) {
    console.log(`Cache: ${cacheStats.entries} entries, ${cacheStats.hits} hits, ${cacheStats.fetches} fetches`);
  }
  for (const failure of summary.failures) {
    console.log(`  ${failure.key}: ${failure.error.message}`);
  }
}

main().catch(error => {
  logger.error('Unhandled error in crawl script:', error);
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'Unknown error'}`);
  process.exit(1);
});
