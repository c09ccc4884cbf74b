import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, errorMessage, getLogLevel, isLogLevel, setLogLevel } from '../src/log.js';

afterEach(() => {
  setLogLevel('info');
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes messages with the scope', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('proxy').info('listening');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('[proxy]');
    expect(String(spy.mock.calls[0][0])).toContain(' listening');
  });

  it('prints the error message after the text', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('filter').error('hook failed', new Error('sink down'));

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('[filter] hook failed:');
    expect(spy.mock.calls[0][1]).toBe('sink down');
  });

  it('drops messages below the current level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const logger = createLogger('x');
    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('prints debug output only at debug level', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');

    createLogger('x').debug('details');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('[x] details');
  });

  it('is silent at silent level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    createLogger('x').error('nobody hears this');

    expect(spy).not.toHaveBeenCalled();
  });
});

describe('log levels', () => {
  it('tracks the current level', () => {
    setLogLevel('error');
    expect(getLogLevel()).toBe('error');
  });

  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it('formats non-Error values', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(new Error('wrapped'))).toBe('wrapped');
  });
});
