import { createLogger, type LogSink } from './logging';

describe('createLogger', () => {
  let debugSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const logger = createLogger({ logging: 'warn' });

    logger.debug('hidden');
    logger.warn('shown', 42);

    expect(debugSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('[pomodoro-timer] shown', 42);
  });

  it('passes everything at debug', () => {
    const logger = createLogger({ logging: 'debug' });

    logger.debug('Event: StateChanged');

    expect(debugSpy).toHaveBeenCalledWith('[pomodoro-timer] Event: StateChanged');
  });

  it('writes nothing when silent', () => {
    const logger = createLogger({ logging: 'silent' });

    logger.error('nope');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('writes to the given sink instead of the console', () => {
    const sink: jest.Mocked<LogSink> = {
      trace: jest.fn(),
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn()
    };
    const logger = createLogger({ logging: 'info' }, sink);

    logger.debug('hidden');
    logger.info('System resumed, restoring timer');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).toHaveBeenCalledWith('[pomodoro-timer] System resumed, restoring timer');
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
