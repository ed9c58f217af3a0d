import { readFile } from 'fs/promises';
import { z } from 'zod';
import { IFetcher } from '../interfaces/IFetcher';
import { CrawlKey, FetchResult, StaticPage } from '../interfaces/types';
import { FetchNotFoundError } from '../errors';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

const datasetSchema = z.record(
  z.string().min(1),
  z.object({
    body: z.string(),
    links: z.array(z.string().min(1)).default([])
  })
);

export interface StaticFetcherOptions {
  /** Simulated latency per fetch, in milliseconds */
  latencyMs?: number;
}

/**
 * Fetcher that answers from a fixed set of pages.
 * Unknown keys reject with {@link FetchNotFoundError}.
 */
export class StaticFetcher implements IFetcher {
  private readonly pages: ReadonlyMap<CrawlKey, StaticPage>;
  private readonly latencyMs: number;
  private readonly logger = LoggingUtils.createTaggedLogger('fetcher');

  constructor(pages: Record<CrawlKey, StaticPage> | Map<CrawlKey, StaticPage>, options: StaticFetcherOptions = {}) {
    this.pages = pages instanceof Map ? new Map(pages) : new Map(Object.entries(pages));
    this.latencyMs = options.latencyMs ?? 0;
  }

  /**
   * Load pages from a JSON file of the form `{ "<key>": { "body": "...", "links": ["..."] } }`
   * @param path Path of the dataset file
   * @throws Error when the file does not match that shape
   */
  static async fromFile(path: string, options: StaticFetcherOptions = {}): Promise<StaticFetcher> {
    const raw = await readFile(path, 'utf-8');
    const parsed = datasetSchema.safeParse(JSON.parse(raw));

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid dataset in ${path}: ${issues}`);
    }

    return new StaticFetcher(parsed.data, options);
  }

  async fetch(key: CrawlKey): Promise<FetchResult> {
    this.logger.debug(`Static fetch: ${key}`);

    if (this.latencyMs > 0) {
      await DelayUtils.delay(this.latencyMs);
    }

    const page = this.pages.get(key);
    if (!page) {
      throw new FetchNotFoundError(key);
    }

    return { content: page.body, links: [...page.links] };
  }

  get keys(): CrawlKey[] {
    return [...this.pages.keys()];
  }
}
