/**
 * Core value types for the neumorphic renderer.
 * All of them are plain immutable data; nothing here draws.
 */

/** Axis-aligned rectangle in device units */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export interface Vec2 {
  readonly dx: number;
  readonly dy: number;
}

/** Channels 0-255, alpha 0-1 */
export interface Rgba {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/**
 * Direction the ambient light comes from.
 * The light shadow is cast toward it, the dark shadow away from it.
 */
export const LightSource = {
  TOP_LEFT: 'top-left',
  TOP_RIGHT: 'top-right',
  BOTTOM_LEFT: 'bottom-left',
  BOTTOM_RIGHT: 'bottom-right',
} as const;
export type LightSource = (typeof LightSource)[keyof typeof LightSource];

export const ShapeVariant = {
  /** Raised: shadows outside the outline, behind content */
  FLAT: 'flat',
  /** Inset: shadows inside the outline, over content */
  PRESSED: 'pressed',
} as const;
export type ShapeVariant = (typeof ShapeVariant)[keyof typeof ShapeVariant];

export interface RoundedCorner {
  readonly kind: 'rounded';
  readonly radius: number;
}

export interface OvalCorner {
  readonly kind: 'oval';
}

export type CornerStyle = RoundedCorner | OvalCorner;

/** Shape variant together with its corner style */
export interface NeuShape {
  readonly shapeVariant: ShapeVariant;
  readonly cornerStyle: CornerStyle;
}

export type Outline =
  | { readonly kind: 'empty' }
  | { readonly kind: 'rounded-rect'; readonly rect: Rect; readonly radius: number }
  | { readonly kind: 'oval'; readonly rect: Rect };

export interface OffsetPair {
  readonly lightOffset: Vec2;
  readonly darkOffset: Vec2;
}

/** Fully resolved configuration for one draw pass */
export interface ShadowStyle {
  readonly lightColor: Rgba;
  readonly darkColor: Rgba;
  readonly elevation: number;
  readonly lightSource: LightSource;
  readonly shapeVariant: ShapeVariant;
  readonly cornerStyle: CornerStyle;
}

export const LIGHT_SOURCES: readonly LightSource[] = Object.values(LightSource);
export const SHAPE_VARIANTS: readonly ShapeVariant[] = Object.values(ShapeVariant);
