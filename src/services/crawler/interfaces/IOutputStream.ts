/**
 * Write side of the stream crawl tasks emit visited keys to.
 * Many producers write; exactly one close marks the end of the run.
 */
export interface IOutputStream<T> {
  /**
   * Emit a value. Resolves once the stream has accepted it, which may wait
   * for the consumer when the stream is bounded.
   */
  write(value: T): Promise<void>;

  /**
   * Mark the stream as finished. Closing twice is an error.
   */
  close(): void;
}
