import { CrawlKey } from './interfaces/types';

export type CrawlerErrorCode =
  | 'FETCH_NOT_FOUND'
  | 'FETCH_TRANSPORT_FAILURE'
  | 'CACHE_CONTENTION'
  | 'CHANNEL_CLOSED'
  | 'INVALID_ARGUMENT';

/**
 * Base class for every error raised by the crawler service.
 * Operational errors are expected failures of a single key or call and never
 * abort a crawl run on their own.
 */
export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;
  readonly isOperational: boolean;

  constructor(message: string, code: CrawlerErrorCode, isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The key has no known content or links
 */
export class FetchNotFoundError extends CrawlerError {
  constructor(readonly key: CrawlKey) {
    super(`Not found: ${key}`, 'FETCH_NOT_FOUND');
  }
}

/**
 * The underlying capability could not be reached or answered with a failure
 */
export class FetchTransportError extends CrawlerError {
  readonly statusCode?: number;

  constructor(readonly key: CrawlKey, message: string, options: { statusCode?: number; cause?: Error } = {}) {
    super(`Failed to fetch ${key}: ${message}`, 'FETCH_TRANSPORT_FAILURE', true, { cause: options.cause });
    this.statusCode = options.statusCode;
  }
}

/**
 * A cache lock could not be acquired within the configured bound
 */
export class CacheContentionError extends CrawlerError {
  constructor(readonly key: CrawlKey, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for the cache lock on ${key}`, 'CACHE_CONTENTION');
  }
}

export class ChannelClosedError extends CrawlerError {
  constructor(message = 'Channel is closed') {
    super(message, 'CHANNEL_CLOSED', false);
  }
}

export class InvalidCrawlArgumentError extends CrawlerError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT', false);
  }
}

/**
 * Normalize any thrown value into an Error for reporting
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
