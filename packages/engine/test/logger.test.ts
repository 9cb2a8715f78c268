import { describe, it, expect } from 'vitest';
import { formatContext, resolveLogLevel } from '../src/logger.js';

describe('resolveLogLevel', () => {
  it('prefers the package variable over LOG_LEVEL', () => {
    expect(resolveLogLevel({ SOFTRELIEF_LOG_LEVEL: 'warn', LOG_LEVEL: 'debug' })).toBe('warn');
    expect(resolveLogLevel({ LOG_LEVEL: ' ERROR ' })).toBe('error');
  });

  it('defaults by NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug');
    expect(resolveLogLevel({})).toBe('debug');
  });

  it('falls back to info for unknown levels', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
  });
});

describe('formatContext', () => {
  it('renders key=value pairs and skips undefined', () => {
    expect(formatContext({ fields: 'shape', count: 2, missing: undefined, box: { w: 1 } })).toBe(
      'fields=shape count=2 box={"w":1}',
    );
  });
});
