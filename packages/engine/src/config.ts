/**
 * Renderer tuning
 *
 * The visual description leaves the blur mapping and the flat clip limit open;
 * both are exposed here as tunables with defaults from the design tokens.
 */

import { z } from 'zod';
import { SHADOW_TUNING } from '@softrelief/design-tokens';
import { ConfigError } from './errors.js';
import { logDebug } from './logger.js';

export interface RenderTuning {
  /** blur radius = elevation * blurFactor */
  readonly blurFactor: number;
  /** flat clip limit = bounds inflated by elevation + blurRadius * clipMarginFactor */
  readonly clipMarginFactor: number;
}

export const DEFAULT_RENDER_TUNING: RenderTuning = Object.freeze({
  blurFactor: SHADOW_TUNING.blurFactor,
  clipMarginFactor: SHADOW_TUNING.clipMarginFactor,
});

const factorSchema = z.number().finite().nonnegative();

export const renderTuningSchema = z
  .object({
    blurFactor: factorSchema.optional(),
    clipMarginFactor: factorSchema.optional(),
  })
  .strict();

export type RenderTuningOverrides = z.infer<typeof renderTuningSchema>;

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

/**
 * Merge overrides onto the defaults
 *
 * @throws ConfigError when an override is not a finite non-negative number or is unknown
 */
export function resolveRenderTuning(overrides: unknown = {}): RenderTuning {
  const parsed = renderTuningSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError('Invalid render tuning', formatIssues(parsed.error));
  }
  return Object.freeze({
    blurFactor: parsed.data.blurFactor ?? DEFAULT_RENDER_TUNING.blurFactor,
    clipMarginFactor: parsed.data.clipMarginFactor ?? DEFAULT_RENDER_TUNING.clipMarginFactor,
  });
}

const ENV_KEYS = {
  blurFactor: 'SOFTRELIEF_BLUR_FACTOR',
  clipMarginFactor: 'SOFTRELIEF_CLIP_MARGIN_FACTOR',
} as const;

/**
 * Read tuning from environment variables, ignoring unset or blank ones
 *
 * @throws ConfigError when a set value is not a finite non-negative number
 */
export function loadRenderTuningFromEnv(env: Record<string, string | undefined>): RenderTuning {
  const overrides: Record<string, number> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const raw = env[key]?.trim();
    if (!raw) {
      continue;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigError('Invalid render tuning', [`${key}: expected a number, received "${raw}"`]);
    }
    overrides[field] = value;
  }
  const tuning = resolveRenderTuning(overrides);
  logDebug('render tuning loaded', { ...tuning });
  return tuning;
}
