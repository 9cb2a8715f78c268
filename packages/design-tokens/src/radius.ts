/**
 * Corner tokens for Softrelief
 *
 * NO platform-specific code - raw values only (in pixels)
 */

/**
 * Corner radius values in pixels
 * `full` is larger than any widget and is clamped by the engine to a stadium shape
 */
export const RADIUS = {
  none: 0,
  sm: 4,
  md: 8,
  lg: 12,
  xl: 16,
  '2xl': 24,
  full: 9999,
} as const;

/** Corner radius used by the default presets */
export const DEFAULT_RADIUS = RADIUS.lg;

// Type exports for type inference
export type RadiusKey = keyof typeof RADIUS;
export type RadiusValue = (typeof RADIUS)[RadiusKey];
