import { ICrawler } from '../interfaces/ICrawler';
import { IFetcher } from '../interfaces/IFetcher';
import { IOutputStream } from '../interfaces/IOutputStream';
import { CrawlKey, CrawlRunOptions, CrawlSummary, CrawlTaskOutcome } from '../interfaces/types';
import { InvalidCrawlArgumentError, toError } from '../errors';
import { CompletionCoordinator } from './CompletionCoordinator';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * State shared by every task of one crawl run
 */
interface CrawlRun {
  fetcher: IFetcher;
  output: IOutputStream<CrawlKey>;
  coordinator: CompletionCoordinator;
  options: CrawlRunOptions;
  // largest depth budget each key has been claimed with
  visited: Map<CrawlKey, number>;
  summary: CrawlSummary;
}

interface TaskResult {
  outcome: CrawlTaskOutcome;
  links: readonly CrawlKey[];
}

/**
 * Crawler that starts one concurrent task per discovered link.
 *
 * Each task fetches its key, writes it to the output stream and spawns its
 * children at `depth - 1`; tasks with no depth left are pruned without a
 * fetch. Children are registered with the run's {@link CompletionCoordinator}
 * before their parent completes, and the coordinator closes the stream when
 * the last task finishes. A parent waits for its children to settle only to
 * surface unexpected failures; fetch failures end the failing key's subtree
 * and nothing else.
 */
export class RecursiveCrawler implements ICrawler {
  private readonly logger = LoggingUtils.createTaggedLogger('crawler');

  /**
   * @param defaults Options applied to every run unless overridden per call
   */
  constructor(private readonly defaults: CrawlRunOptions = {}) {}

  async crawl(
    rootKey: CrawlKey,
    maxDepth: number,
    fetcher: IFetcher,
    output: IOutputStream<CrawlKey>,
    options: CrawlRunOptions = {}
  ): Promise<CrawlSummary> {
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new InvalidCrawlArgumentError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }

    const startTime = Date.now();
    const run: CrawlRun = {
      fetcher,
      output,
      coordinator: new CompletionCoordinator(() => output.close()),
      options: { ...this.defaults, ...options },
      visited: new Map(),
      summary: {
        rootKey,
        maxDepth,
        emitted: 0,
        pruned: 0,
        failed: 0,
        cancelled: 0,
        skipped: 0,
        failures: [],
        durationMs: 0
      }
    };

    this.logger.info(`Starting crawl at ${rootKey} (max depth ${maxDepth})`);

    await this.spawn(run, rootKey, maxDepth);
    await run.coordinator.whenDrained();

    run.summary.durationMs = Date.now() - startTime;
    this.logger.info(
      `Crawl finished in ${run.summary.durationMs}ms: ${run.summary.emitted} emitted, ` +
      `${run.summary.failed} failed, ${run.summary.pruned} pruned, ` +
      `${run.summary.cancelled} cancelled, ${run.summary.skipped} skipped`
    );

    return run.summary;
  }

  private spawn(run: CrawlRun, key: CrawlKey, depth: number): Promise<void> {
    run.coordinator.register();
    return this.runTask(run, key, depth);
  }

  private async runTask(run: CrawlRun, key: CrawlKey, depth: number): Promise<void> {
    const children: Promise<void>[] = [];

    try {
      const { outcome, links } = await this.visit(run, key, depth);
      this.logger.debug(`${key} at depth ${depth}: ${outcome}`);

      for (const link of links) {
        children.push(this.spawn(run, link, depth - 1));
      }
    } finally {
      run.coordinator.complete();
    }

    await settleAll(children);
  }

  private async visit(run: CrawlRun, key: CrawlKey, depth: number): Promise<TaskResult> {
    const { summary, options } = run;

    if (depth <= 0) {
      summary.pruned += 1;
      return { outcome: CrawlTaskOutcome.PRUNED, links: [] };
    }

    if (options.signal?.aborted) {
      summary.cancelled += 1;
      return { outcome: CrawlTaskOutcome.CANCELLED, links: [] };
    }

    const previousBudget = run.visited.get(key);
    if (options.dedupeTraversal) {
      if (previousBudget !== undefined && previousBudget >= depth) {
        summary.skipped += 1;
        return { outcome: CrawlTaskOutcome.SKIPPED, links: [] };
      }
      run.visited.set(key, depth);
    }

    let links: readonly CrawlKey[];
    try {
      ({ links } = await run.fetcher.fetch(key));
    } catch (error) {
      if (options.dedupeTraversal) {
        this.releaseClaim(run, key, depth, previousBudget);
      }
      this.reportFailure(run, key, depth, toError(error));
      return { outcome: CrawlTaskOutcome.FETCH_FAILED, links: [] };
    }

    if (options.signal?.aborted) {
      summary.cancelled += 1;
      return { outcome: CrawlTaskOutcome.CANCELLED, links: [] };
    }

    await run.output.write(key);
    summary.emitted += 1;

    return { outcome: CrawlTaskOutcome.EXPANDED, links };
  }

  /**
   * Give a failed key back to other branches, unless a deeper claim replaced ours meanwhile
   */
  private releaseClaim(run: CrawlRun, key: CrawlKey, depth: number, previousBudget: number | undefined): void {
    if (run.visited.get(key) !== depth) {
      return;
    }
    if (previousBudget === undefined) {
      run.visited.delete(key);
    } else {
      run.visited.set(key, previousBudget);
    }
  }

  private reportFailure(run: CrawlRun, key: CrawlKey, depth: number, error: Error): void {
    run.summary.failed += 1;
    run.summary.failures.push({ key, depth, error });
    this.logger.warn(`Fetch failed for ${key} at depth ${depth}: ${error.message}`);
    run.options.onError?.(key, error, depth);
  }
}

/**
 * Wait for every task, then rethrow the first failure if there was one
 */
async function settleAll(tasks: Promise<void>[]): Promise<void> {
  const results = await Promise.allSettled(tasks);
  const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failure) {
    throw failure.reason;
  }
}
