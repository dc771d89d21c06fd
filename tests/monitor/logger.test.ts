import { LogLevel, MonitorLogger, toLogLevel } from '../../src/monitor/utils/logger';

describe('MonitorLogger', () => {
  let infoSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should include module and task id in each line', () => {
    const logger = new MonitorLogger({ moduleName: 'monitor' }).createSubLogger('fetcher');

    logger.info('Order status 2100 (In production)', { attempt: 1 }, 'task-1');

    expect(infoSpy).toHaveBeenCalledTimes(1);
    const line = String(infoSpy.mock.calls[0][0]);
    expect(line).toContain('[monitor.fetcher] [task:task-1] Order status 2100 (In production) {"attempt":1}');
  });

  it('should drop entries below the minimum level', () => {
    const logger = new MonitorLogger({ minLevel: LogLevel.WARN });

    logger.info('hidden');
    logger.debug('hidden');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('should let sub-loggers follow the parent level', () => {
    const root = new MonitorLogger();
    const child = root.createSubLogger('scheduler');

    child.debug('before');
    root.setLevel('debug');
    child.debug('after');

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(String(debugSpy.mock.calls[0][0])).toContain('after');
    expect(child.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('should append the error message', () => {
    const logger = new MonitorLogger();

    logger.error('Cycle failed unexpectedly', new Error('boom'), undefined, 'task-1');

    expect(String(errorSpy.mock.calls[0][0])).toContain('Cycle failed unexpectedly\nError: boom');
  });

  it('should stay quiet without console output', () => {
    new MonitorLogger({ consoleOutput: false }).error('nothing', new Error('boom'));

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should map level names', () => {
    expect(toLogLevel('warn')).toBe(LogLevel.WARN);
    expect(toLogLevel(LogLevel.FATAL)).toBe(LogLevel.FATAL);
    expect(toLogLevel('info')).toBe(LogLevel.INFO);
  });
});
