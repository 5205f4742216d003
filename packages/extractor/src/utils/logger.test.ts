import { createLogger, setLogLevel } from './logger';

describe('ExtractorLogger', () => {
  const logger = createLogger('[Test]', true);
  const savedLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    jest.restoreAllMocks();
    setLogLevel(null);
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
  });

  it('should prefix messages with timestamp, prefix and level', () => {
    delete process.env.LOG_LEVEL;
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);

    logger.info('hello');

    expect(info.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z \[Test\] \[INFO\] hello$/);
  });

  it('should let a configured level override LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'debug';
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    setLogLevel('warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);

    setLogLevel(null);
    logger.debug('shown again');
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('should stay silent when disabled', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('[Quiet]', false).error('nothing');

    expect(error).not.toHaveBeenCalled();
  });
});
