import { createLogger, Logger, parseLogLevel } from '../../utils/logger';

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel(' Warn ')).toBe('WARN');
  });

  it('should fall back to INFO', () => {
    expect(parseLogLevel('verbose')).toBe('INFO');
  });
});

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;

  beforeEach(() => {
    // console methods are already mocks from the setup file, so spyOn hands back the same mock
    jest.clearAllMocks();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function lastEntry(spy: jest.SpyInstance): Record<string, unknown> {
    const calls = spy.mock.calls;
    return JSON.parse(calls[calls.length - 1][0]);
  }

  it('should write one JSON line per entry', () => {
    new Logger('snapshot').info('Snapshot 3: collected 5, saved 3, dropped 2', { expired: 1 });

    const entry = lastEntry(logSpy);
    expect(entry.level).toBe('INFO');
    expect(entry.service).toBe('snapshot');
    expect(entry.message).toBe('Snapshot 3: collected 5, saved 3, dropped 2');
    expect(entry.data).toEqual({ expired: 1 });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should include error details', () => {
    new Logger('database').error('Insert failed', { rows: 3 }, new Error('disk full'));

    const entry = lastEntry(errorSpy);
    expect(entry.error).toEqual(expect.objectContaining({ name: 'Error', message: 'disk full' }));
  });

  it('should drop entries below its level', () => {
    const logger = new Logger('quiet', 'WARN');

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
    expect(lastEntry(warnSpy).message).toBe('shown');
  });

  it('should log websocket events at info', () => {
    new Logger('quote-stream').websocketEvent('connected', { stream: 'A-1 ... A-2 (total 2)' });

    expect(lastEntry(logSpy)).toEqual(
      expect.objectContaining({
        message: 'WebSocket connected',
        data: { event: 'connected', stream: 'A-1 ... A-2 (total 2)' },
      })
    );
  });

  it('should log successful database operations at debug and failures at error', () => {
    const logger = new Logger('database', 'DEBUG');

    logger.databaseOperation('query', { query: 'SELECT 1', duration: 4 });
    expect(lastEntry(debugSpy).message).toBe('Database query completed');

    logger.databaseOperation('query', { query: 'SELECT 1' }, new Error('timeout'));
    expect(lastEntry(errorSpy).message).toBe('Database query failed');
  });

  it('should report health checks as info or warn', () => {
    const logger = new Logger('health');

    logger.healthCheck('feed', 'healthy');
    expect(lastEntry(logSpy).message).toBe('Health check passed');

    logger.healthCheck('feed', 'unhealthy', { alerts: ['Database is not connected'] });
    expect(lastEntry(warnSpy).data).toEqual({
      component: 'feed',
      status: 'unhealthy',
      alerts: ['Database is not connected'],
    });
  });

  it('should name loggers created by the factory', () => {
    const logger = createLogger('refresh', 'ERROR');

    logger.info('hidden');
    logger.error('Metadata refresh failed, keeping current universe');

    expect(logSpy).not.toHaveBeenCalled();
    expect(lastEntry(errorSpy)).toEqual(
      expect.objectContaining({ service: 'refresh', message: 'Metadata refresh failed, keeping current universe' })
    );
  });
});
