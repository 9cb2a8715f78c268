import { parseColor } from '@softrelief/design-tokens';
import { StyleError } from './errors.js';
import type { CornerStyle, LightSource, NeuShape, Rgba, ShadowStyle, ShapeVariant } from './types.js';

/** A color as Rgba channels or any string `parseColor` understands */
export type ColorInput = Rgba | string;

export interface ShadowStyleFields {
  readonly lightColor: ColorInput;
  readonly darkColor: ColorInput;
  readonly elevation: number;
  readonly lightSource: LightSource;
  readonly shapeVariant: ShapeVariant;
  readonly cornerStyle: CornerStyle;
}

export const roundedCorner = (radius: number): CornerStyle => Object.freeze({ kind: 'rounded', radius });

export const OVAL: CornerStyle = Object.freeze({ kind: 'oval' });

export const flat = (cornerStyle: CornerStyle): NeuShape => Object.freeze({ shapeVariant: 'flat', cornerStyle });

export const pressed = (cornerStyle: CornerStyle): NeuShape => Object.freeze({ shapeVariant: 'pressed', cornerStyle });

/** Clamp to a finite non-negative number */
export const clampLength = (value: number): number => (Number.isFinite(value) && value > 0 ? value : 0);

/**
 * @throws StyleError when a string is not a supported color
 */
export function toRgba(color: ColorInput): Rgba {
  if (typeof color !== 'string') {
    return Object.freeze({ r: color.r, g: color.g, b: color.b, a: color.a });
  }
  const parsed = parseColor(color);
  if (!parsed) {
    throw new StyleError('Unsupported color', [`"${color}"`]);
  }
  return Object.freeze(parsed);
}

/** Negative or NaN radii become 0; large ones, +Infinity included, are clamped once bounds are known */
const clampRadiusInput = (radius: number): number => (Number.isNaN(radius) || radius <= 0 ? 0 : radius);

function normalizeCorner(cornerStyle: CornerStyle): CornerStyle {
  return cornerStyle.kind === 'oval' ? OVAL : roundedCorner(clampRadiusInput(cornerStyle.radius));
}

/**
 * Assemble an immutable style from discrete fields.
 * Negative or non-finite elevation becomes 0, as does a negative or NaN corner
 * radius; the radius is clamped to the shape's size later, when bounds are known.
 *
 * @throws StyleError when a color string cannot be parsed
 */
export function createShadowStyle(fields: ShadowStyleFields): ShadowStyle {
  return Object.freeze({
    lightColor: toRgba(fields.lightColor),
    darkColor: toRgba(fields.darkColor),
    elevation: clampLength(fields.elevation),
    lightSource: fields.lightSource,
    shapeVariant: fields.shapeVariant,
    cornerStyle: normalizeCorner(fields.cornerStyle),
  });
}

/** Copy of `style` with some fields replaced */
export function withStyle(style: ShadowStyle, changes: Partial<ShadowStyleFields>): ShadowStyle {
  return createShadowStyle({ ...style, ...changes });
}
