/**
 * Zod schemas for style bundles that come from untyped sources
 * (JSON themes, props forwarded from another layer).
 */

import { z } from 'zod';
import { NEU_SHADOW, parseColor } from '@softrelief/design-tokens';
import { StyleError } from './errors.js';
import { logWarn } from './logger.js';
import { OVAL, createShadowStyle, roundedCorner, toRgba } from './style.js';
import { LIGHT_SOURCES, SHAPE_VARIANTS, type CornerStyle, type ShadowStyle } from './types.js';

const channelSchema = z.number().int().min(0).max(255);

export const rgbaSchema = z.object({
  r: channelSchema,
  g: channelSchema,
  b: channelSchema,
  a: z.number().min(0).max(1),
});

const colorStringSchema = z.string().transform((value, ctx) => {
  const parsed = parseColor(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported color "${value}"` });
    return z.NEVER;
  }
  return parsed;
});

export const colorSchema = z.union([rgbaSchema, colorStringSchema]);

const lightSourceSchema = z.string().refine(
  (val): val is ShadowStyle['lightSource'] => LIGHT_SOURCES.some((source) => source === val),
  { message: 'Invalid light source' },
);

const shapeVariantSchema = z.string().refine(
  (val): val is ShadowStyle['shapeVariant'] => SHAPE_VARIANTS.some((variant) => variant === val),
  { message: 'Invalid shape variant' },
);

export const cornerStyleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('rounded'), radius: z.number() }),
  z.object({ kind: z.literal('oval') }),
]);

const elevationSchema = z.number();

export const shadowStyleSchema = z.object({
  lightColor: colorSchema,
  darkColor: colorSchema,
  elevation: elevationSchema,
  lightSource: lightSourceSchema,
  shapeVariant: shapeVariantSchema,
  cornerStyle: cornerStyleSchema,
});

export type ShadowStyleInput = z.input<typeof shadowStyleSchema>;

const toCorner = (corner: z.infer<typeof cornerStyleSchema>): CornerStyle =>
  corner.kind === 'oval' ? OVAL : roundedCorner(corner.radius);

/**
 * Strictly validate a style bundle
 *
 * @throws StyleError listing every invalid field
 */
export function parseShadowStyle(input: unknown): ShadowStyle {
  const parsed = shadowStyleSchema.safeParse(input);
  if (!parsed.success) {
    throw new StyleError(
      'Invalid shadow style',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  const { cornerStyle, ...rest } = parsed.data;
  return createShadowStyle({ ...rest, cornerStyle: toCorner(cornerStyle) });
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

/**
 * Build a style from whatever is given, falling back field by field.
 * An invalid shape variant or corner style renders as a flat rectangle with
 * radius 0; invalid colors take the light theme palette, an invalid elevation 0
 * and an invalid light source top-left. Never throws.
 */
export function resolveShadowStyle(input: unknown): ShadowStyle {
  const record = isRecord(input) ? input : {};
  const fallbacks: string[] = [];

  const lightColor = colorSchema.safeParse(record.lightColor);
  const darkColor = colorSchema.safeParse(record.darkColor);
  const elevation = elevationSchema.safeParse(record.elevation);
  const lightSource = lightSourceSchema.safeParse(record.lightSource);
  const shapeVariant = shapeVariantSchema.safeParse(record.shapeVariant);
  const cornerStyle = cornerStyleSchema.safeParse(record.cornerStyle);

  if (!lightColor.success) fallbacks.push('lightColor');
  if (!darkColor.success) fallbacks.push('darkColor');
  if (!elevation.success) fallbacks.push('elevation');
  if (!lightSource.success) fallbacks.push('lightSource');

  const shapeValid = shapeVariant.success && cornerStyle.success;
  if (!shapeValid) fallbacks.push('shape');

  if (fallbacks.length > 0) {
    logWarn('shadow style fell back to defaults', { fields: fallbacks.join(',') });
  }

  return createShadowStyle({
    lightColor: lightColor.success ? lightColor.data : toRgba(NEU_SHADOW.light.light),
    darkColor: darkColor.success ? darkColor.data : toRgba(NEU_SHADOW.light.dark),
    elevation: elevation.success ? elevation.data : 0,
    lightSource: lightSource.success ? lightSource.data : 'top-left',
    shapeVariant: shapeVariant.success && cornerStyle.success ? shapeVariant.data : 'flat',
    cornerStyle: shapeVariant.success && cornerStyle.success ? toCorner(cornerStyle.data) : roundedCorner(0),
  });
}
