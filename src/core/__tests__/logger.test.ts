import { describe, it, expect, afterEach } from 'vitest';
import { bytesToSizeString, closeLogger, getLogger } from '../logger.js';

describe('bytesToSizeString', () => {
  it('picks the largest whole unit', () => {
    expect(bytesToSizeString(10 * 1024 * 1024)).toBe('10m');
    expect(bytesToSizeString(2 * 1024 * 1024 * 1024)).toBe('2g');
    expect(bytesToSizeString(1536)).toBe('1k');
    expect(bytesToSizeString(512)).toBe('512');
  });
});

describe('getLogger', () => {
  afterEach(() => {
    closeLogger();
  });

  it('returns a silent fallback under vitest before initialization', () => {
    const log = getLogger('test');
    expect(log.level).toBe('silent');
    expect(log.bindings()).toEqual({ subsystem: 'test' });
  });
});
