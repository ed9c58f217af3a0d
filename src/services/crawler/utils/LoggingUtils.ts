import logger from '../../../utils/logger';

/**
 * Log levels understood by the crawler's tagged loggers
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  NONE = 'none'
}

/**
 * Logger bound to a single tag, as returned by {@link LoggingUtils.createTaggedLogger}
 */
export interface TaggedLogger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string | Error, context?: object): void;
}

const ORDERED_LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Tag- and level-gated logging for the crawler service.
 * Messages that pass both gates are forwarded to the shared winston logger.
 */
export class LoggingUtils {
  private static currentLevel: LogLevel = LogLevel.DEBUG;
  private static enabledTags: Set<string> = new Set(['crawler', 'cache', 'fetcher', 'http']);

  static setLogLevel(level: LogLevel): void {
    this.currentLevel = level;
  }

  static getLogLevel(): LogLevel {
    return this.currentLevel;
  }

  static enableTag(tag: string): void {
    this.enabledTags.add(tag.toLowerCase());
  }

  static disableTag(tag: string): void {
    this.enabledTags.delete(tag.toLowerCase());
  }

  static isTagEnabled(tag: string): boolean {
    return this.enabledTags.has(tag.toLowerCase());
  }

  static debug(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.DEBUG, message, tag, context);
  }

  static info(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.INFO, message, tag, context);
  }

  static warn(message: string, tag?: string, context?: object): void {
    this.log(LogLevel.WARN, message, tag, context);
  }

  /**
   * Log an error message. Errors are flattened so winston keeps the stack.
   */
  static error(message: string | Error, tag?: string, context?: object): void {
    if (message instanceof Error) {
      this.log(LogLevel.ERROR, message.message, tag, {
        ...context,
        stack: message.stack,
        name: message.name
      });
    } else {
      this.log(LogLevel.ERROR, message, tag, context);
    }
  }

  /**
   * Whether a message at this level and tag would reach the underlying logger
   */
  static isEnabled(level: LogLevel, tag?: string): boolean {
    return !this.isLevelDisabled(level) && (!tag || this.isTagEnabled(tag));
  }

  private static log(level: LogLevel, message: string, tag?: string, context?: object): void {
    if (!this.isEnabled(level, tag)) {
      return;
    }

    const formattedMessage = tag ? `[${tag}] ${message}` : message;

    switch (level) {
      case LogLevel.DEBUG:
        logger.debug(formattedMessage, context);
        break;
      case LogLevel.INFO:
        logger.info(formattedMessage, context);
        break;
      case LogLevel.WARN:
        logger.warn(formattedMessage, context);
        break;
      case LogLevel.ERROR:
        logger.error(formattedMessage, context);
        break;
    }
  }

  private static isLevelDisabled(level: LogLevel): boolean {
    if (this.currentLevel === LogLevel.NONE || level === LogLevel.NONE) {
      return true;
    }

    return ORDERED_LEVELS.indexOf(level) < ORDERED_LEVELS.indexOf(this.currentLevel);
  }

  /**
   * Create a scoped logger with a fixed tag
   * @param tag The tag to scope the logger with
   */
  static createTaggedLogger(tag: string): TaggedLogger {
    return {
      debug: (message, context) => this.debug(message, tag, context),
      info: (message, context) => this.info(message, tag, context),
      warn: (message, context) => this.warn(message, tag, context),
      error: (message, context) => this.error(message, tag, context)
    };
  }
}
