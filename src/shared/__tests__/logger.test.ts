import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../logger.js';

describe('createLogger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('writes prefixed lines to stderr at or above the level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('debug');

    createLogger('normalize').debug('detected', 'agent-traces');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const [prefix, ...rest] = errorSpy.mock.calls[0];
    expect(String(prefix)).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[DEBUG\] \[normalize\]$/);
    expect(rest).toEqual(['detected', 'agent-traces']);
  });

  it('drops messages below the level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const log = createLogger('cli');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
