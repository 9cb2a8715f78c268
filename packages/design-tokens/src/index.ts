/**
 * @softrelief/design-tokens
 *
 * Design tokens for neumorphic surfaces.
 * Consumed by @softrelief/engine presets and by host themes.
 *
 * IMPORTANT: This package contains ONLY raw values (strings, numbers, objects)
 * plus the color parser. NO drawing code.
 */

// Colors
export {
  NEU_SHADOW,
  type ThemeName,
  type ShadowPair,
} from './colors.js';

// Elevation
export {
  ELEVATION,
  SHADOW_TUNING,
  type ElevationLevel,
  type ElevationValue,
} from './shadows.js';

// Corners
export {
  RADIUS,
  DEFAULT_RADIUS,
  type RadiusKey,
  type RadiusValue,
} from './radius.js';

// Color parsing
export { parseColor, formatColor, type ParsedColor } from './color.js';
