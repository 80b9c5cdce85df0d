import { Logger, setLogLevel } from '../logger';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    process.env.LOG_LEVEL = originalLevel;
    setLogLevel(undefined);
  });

  it('should drop messages below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = new Logger();

    log.info('hidden');
    log.warn('shown', { url: 'https://news.example/rss' });

    expect(console.info).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[WARN\]$/), 'shown', { url: 'https://news.example/rss' });
  });

  it('should prefix messages from child loggers with their scope', () => {
    process.env.LOG_LEVEL = 'debug';
    new Logger().child('CafeF').child('listing').debug('3 article links');

    expect(console.debug).toHaveBeenCalledWith(expect.any(String), '[CafeF:listing] 3 article links', '');
  });

  it('should pass the error after the data', () => {
    process.env.LOG_LEVEL = 'error';
    const error = new Error('disk full');
    new Logger().error('write failed', error);

    expect(console.error).toHaveBeenCalledWith(expect.any(String), 'write failed', '', error);
  });

  it('should let a configured level override LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';
    const log = new Logger().child('pipeline');
    setLogLevel('info');

    log.info('visible');
    expect(console.info).toHaveBeenCalledWith(expect.any(String), '[pipeline] visible', '');

    setLogLevel(undefined);
    log.info('hidden again');
    expect(console.info).toHaveBeenCalledTimes(1);
  });
});
