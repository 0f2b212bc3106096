import { describe, it, expect } from 'vitest';
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, resolveLogLevel } from '../src/config';

describe('resolveLogLevel', () => {
  it('reads the level from the environment', () => {
    expect(resolveLogLevel({ [LOG_LEVEL_ENV]: 'debug' })).toBe('debug');
    expect(resolveLogLevel({ [LOG_LEVEL_ENV]: ' Error ' })).toBe('error');
  });

  it('falls back to the default for missing or unknown values', () => {
    expect(DEFAULT_LOG_LEVEL).toBe('warn');
    expect(resolveLogLevel({})).toBe('warn');
    expect(resolveLogLevel({ [LOG_LEVEL_ENV]: 'loud' })).toBe('warn');
  });
});
