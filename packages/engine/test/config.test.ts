import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RENDER_TUNING,
  loadRenderTuningFromEnv,
  resolveRenderTuning,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('resolveRenderTuning', () => {
  it('returns the defaults with no overrides', () => {
    expect(resolveRenderTuning()).toEqual({ blurFactor: 1, clipMarginFactor: 2 });
    expect(DEFAULT_RENDER_TUNING).toEqual({ blurFactor: 1, clipMarginFactor: 2 });
  });

  it('merges partial overrides', () => {
    expect(resolveRenderTuning({ blurFactor: 0.5 })).toEqual({ blurFactor: 0.5, clipMarginFactor: 2 });
    expect(resolveRenderTuning({ clipMarginFactor: 0 })).toEqual({ blurFactor: 1, clipMarginFactor: 0 });
  });

  it('rejects negative, non-finite and unknown values', () => {
    expect(() => resolveRenderTuning({ blurFactor: -1 })).toThrow(ConfigError);
    expect(() => resolveRenderTuning({ clipMarginFactor: Number.POSITIVE_INFINITY })).toThrow(ConfigError);
    expect(() => resolveRenderTuning({ spread: 2 })).toThrow(ConfigError);
    expect(() => resolveRenderTuning('fast')).toThrow(ConfigError);
  });

  it('reports the offending field', () => {
    try {
      resolveRenderTuning({ blurFactor: 'big' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith('blurFactor:')).toBe(true);
      }
    }
  });
});

describe('loadRenderTuningFromEnv', () => {
  it('reads set variables and ignores blank ones', () => {
    expect(
      loadRenderTuningFromEnv({ SOFTRELIEF_BLUR_FACTOR: ' 1.5 ', SOFTRELIEF_CLIP_MARGIN_FACTOR: '' }),
    ).toEqual({ blurFactor: 1.5, clipMarginFactor: 2 });
  });

  it('returns the defaults for an empty environment', () => {
    expect(loadRenderTuningFromEnv({})).toEqual(DEFAULT_RENDER_TUNING);
  });

  it('throws on a non-numeric value', () => {
    expect(() => loadRenderTuningFromEnv({ SOFTRELIEF_CLIP_MARGIN_FACTOR: 'wide' })).toThrow(
      'Invalid render tuning: SOFTRELIEF_CLIP_MARGIN_FACTOR: expected a number, received "wide"',
    );
  });

  it('throws on a negative value', () => {
    expect(() => loadRenderTuningFromEnv({ SOFTRELIEF_BLUR_FACTOR: '-2' })).toThrow(ConfigError);
  });
});
