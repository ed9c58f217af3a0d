/**
 * Utilities for managing delays and retries in the crawler service
 */
export class DelayUtils {
  /**
   * Creates a promise that resolves after the specified delay
   */
  public static delay(ms: number): Promise<void> {
    return new Promise<void>(resolve => setTimeout(resolve, ms));
  }

  /**
   * Exponential backoff with up to 30% jitter
   * @param attempt Current attempt number (0-based)
   * @param baseDelay Base delay in milliseconds
   * @param maxDelay Maximum delay in milliseconds
   */
  static exponentialBackoff(attempt: number, baseDelay = 1000, maxDelay = 30000): number {
    const delay = baseDelay * Math.pow(2, attempt);
    const jitter = Math.random() * 0.3 * delay;
    return Math.min(delay + jitter, maxDelay);
  }

  /**
   * Executes a function, retrying failures with exponential backoff
   * @param fn The function to execute
   * @param maxRetries Maximum number of retry attempts
   * @param baseDelay Base delay in milliseconds
   * @param shouldRetry Errors for which this returns false are rethrown at once
   * @returns The function's result, or rejects with the last error
   */
  static async withRetry<T>(
    fn: () => Promise<T>,
    maxRetries = 3,
    baseDelay = 1000,
    shouldRetry: (error: Error) => boolean = () => true
  ): Promise<T> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt === maxRetries || !shouldRetry(lastError)) {
          throw lastError;
        }

        await this.delay(this.exponentialBackoff(attempt, baseDelay));
      }
    }

    throw lastError || new Error('Retry failed');
  }
}
