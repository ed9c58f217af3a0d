/**
 * Counts outstanding crawl tasks across a run and fires the drain callback
 * exactly once, on the decrement that brings the count to zero.
 *
 * Callers register a task before starting it, so a child is always counted
 * before its parent completes and the count cannot reach zero early.
 */
export class CompletionCoordinator {
  private outstanding = 0;
  private drained = false;
  private readonly drainedPromise: Promise<void>;
  private resolveDrained: () => void = () => undefined;

  /**
   * @param onDrained Invoked once when the last registered task completes
   */
  constructor(private readonly onDrained: () => void) {
    this.drainedPromise = new Promise<void>(resolve => {
      this.resolveDrained = resolve;
    });
  }

  /**
   * Record tasks that are about to start
   * @param count Number of tasks to register
   */
  register(count = 1): void {
    if (this.drained) {
      throw new Error('Cannot register tasks after the run has drained');
    }
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Task count must be a non-negative integer, got ${count}`);
    }
    this.outstanding += count;
  }

  /**
   * Record that one registered task reached a terminal state
   */
  complete(): void {
    if (this.outstanding === 0) {
      throw new Error('complete() called without an outstanding task');
    }

    this.outstanding -= 1;
    if (this.outstanding > 0) {
      return;
    }

    this.drained = true;
    try {
      this.onDrained();
    } finally {
      this.resolveDrained();
    }
  }

  whenDrained(): Promise<void> {
    return this.drainedPromise;
  }

  get pending(): number {
    return this.outstanding;
  }

  get isDrained(): boolean {
    return this.drained;
  }
}
