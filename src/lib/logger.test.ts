import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, Logger, createLogger, setRootLogLevel } from './logger';

describe('Logger', () => {
  afterEach(() => {
    setRootLogLevel('silent');
    vi.restoreAllMocks();
  });

  it('prefixes messages and passes extra arguments through', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    new Logger({ prefix: 'Scene', level: LogLevel.DEBUG }).warn('Dropped', { count: 2 });
    expect(spy).toHaveBeenCalledWith('[Scene] Dropped', { count: 2 });
  });

  it('skips messages below its level', () => {
    const debug = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new Logger({ level: LogLevel.ERROR });

    log.debug('hidden');
    log.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('shown');
  });

  it('joins child prefixes', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
    new Logger({ prefix: 'Export', level: LogLevel.INFO }).child('Jobs').info('Started');
    expect(spy).toHaveBeenCalledWith('[Export:Jobs] Started');
  });

  it('follows the root level until overridden', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const log = createLogger('Schedule');

    log.info('silent');
    setRootLogLevel('info');
    log.info('audible');
    log.setLevel(LogLevel.SILENT);
    log.info('muted');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[Schedule] audible');
  });
});
