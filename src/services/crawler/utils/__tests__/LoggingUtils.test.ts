import logger from '../../../../utils/logger';
import { LoggingUtils, LogLevel } from '../LoggingUtils';

describe('LoggingUtils', () => {
  let debugSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(logger, 'debug').mockReturnValue(logger);
    warnSpy = jest.spyOn(logger, 'warn').mockReturnValue(logger);
    errorSpy = jest.spyOn(logger, 'error').mockReturnValue(logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    LoggingUtils.setLogLevel(LogLevel.DEBUG);
    LoggingUtils.enableTag('cache');
  });

  it('should prefix messages with their tag', () => {
    LoggingUtils.createTaggedLogger('cache').debug('Cache hit: a');

    expect(debugSpy).toHaveBeenCalledWith('[cache] Cache hit: a', undefined);
  });

  it('should drop messages below the current level', () => {
    LoggingUtils.setLogLevel(LogLevel.WARN);
    const log = LoggingUtils.createTaggedLogger('crawler');

    log.debug('ignored');
    log.warn('kept');

    expect(LoggingUtils.getLogLevel()).toBe(LogLevel.WARN);
    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[crawler] kept', undefined);
  });

  it('should drop everything at level none', () => {
    LoggingUtils.setLogLevel(LogLevel.NONE);

    LoggingUtils.createTaggedLogger('crawler').error('ignored');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should drop messages for disabled tags', () => {
    LoggingUtils.disableTag('Cache');

    LoggingUtils.createTaggedLogger('cache').warn('ignored');

    expect(LoggingUtils.isTagEnabled('cache')).toBe(false);
    expect(LoggingUtils.isEnabled(LogLevel.WARN, 'cache')).toBe(false);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should flatten errors into message and stack', () => {
    const error = new Error('boom');

    LoggingUtils.createTaggedLogger('http').error(error, { key: 'a' });

    expect(errorSpy).toHaveBeenCalledWith('[http] boom', { key: 'a', stack: error.stack, name: 'Error' });
  });
});
