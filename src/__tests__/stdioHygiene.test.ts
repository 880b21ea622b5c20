import { afterEach, describe, expect, it, vi } from 'vitest';
import { installStdioHygiene, logServer } from '../utils/stdioHygiene.js';

describe('installStdioHygiene', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('routes console.log to stderr until restored', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const originalLog = console.log;
    const restore = installStdioHygiene();
    try {
      console.log('hello', 1);
      expect(errorSpy).toHaveBeenCalledWith('hello', 1);
    } finally {
      restore();
    }
    expect(console.log).toBe(originalLog);
  });
});

describe('logServer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the server name', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logServer('Server started', { mode: 'full' });
    expect(errorSpy).toHaveBeenCalledWith('[rinex-mcp] Server started', { mode: 'full' });
  });
});
