/**
 * Elevation tokens for Softrelief
 *
 * Elevation is a length in device units. The engine uses it both as the
 * shadow offset magnitude on each axis and as the base of the blur radius.
 *
 * NO platform-specific code - raw values only
 */

/**
 * Elevation scale - numeric values in pixels
 */
export const ELEVATION = {
  none: 0,
  subtle: 3,
  default: 6,
  raised: 10,
  floating: 14,
} as const;

/**
 * Renderer tuning defaults
 * blurFactor scales elevation into blur radius; clipMarginFactor scales the blur
 * radius into the extra room kept around the bounds for flat shadows
 */
export const SHADOW_TUNING = {
  blurFactor: 1,
  clipMarginFactor: 2,
} as const;

// Type exports for type inference
export type ElevationLevel = keyof typeof ELEVATION;
export type ElevationValue = (typeof ELEVATION)[ElevationLevel];
