import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, setLogLevel } from './logger.ts';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('prefixes the scope', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('bot').info('ready', 3);
    expect(spy).toHaveBeenCalledWith('[bot]', 'ready', 3);
  });

  it('drops levels below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger('x');

    log.debug('hidden');
    setLogLevel('warn');
    log.warn('shown');
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);

    setLogLevel('debug');
    log.debug('now shown');
    expect(debug).toHaveBeenCalledWith('[x]', 'now shown');
  });

  it('knows its levels', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
