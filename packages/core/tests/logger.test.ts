import { describe, it, expect, afterEach } from 'vitest';
import { initLogger, getLogger, isLoggerInitialized, closeLogger } from '../src/logger.js';

afterEach(() => {
  closeLogger();
});

describe('getLogger', () => {
  it('returns a warn-level logger before initialisation', () => {
    expect(isLoggerInitialized()).toBe(false);
    const log = getLogger('store');
    expect(log.level).toBe('warn');
    expect(log.bindings()).toMatchObject({ subsystem: 'store' });
  });

  it('inherits the configured level after initialisation', () => {
    initLogger({ level: 'debug' });

    expect(isLoggerInitialized()).toBe(true);
    expect(getLogger('cascade').level).toBe('debug');
  });
});

describe('closeLogger', () => {
  it('returns to the fallback logger', () => {
    initLogger({ level: 'silent' });
    closeLogger();

    expect(isLoggerInitialized()).toBe(false);
    expect(getLogger('cli').level).toBe('warn');
  });
});
