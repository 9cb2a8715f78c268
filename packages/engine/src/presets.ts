import { DEFAULT_RADIUS, ELEVATION, NEU_SHADOW, type ThemeName } from '@softrelief/design-tokens';
import { createShadowStyle, roundedCorner, toRgba } from './style.js';
import type { Rgba, ShadowStyle, ShapeVariant } from './types.js';

/**
 * Shadow colors for a theme. The host decides which theme is active;
 * nothing here looks at system settings.
 */
export function themeShadowColors(theme: ThemeName): { lightColor: Rgba; darkColor: Rgba } {
  const pair = NEU_SHADOW[theme];
  return { lightColor: toRgba(pair.light), darkColor: toRgba(pair.dark) };
}

function defaultStyle(theme: ThemeName, shapeVariant: ShapeVariant): ShadowStyle {
  return createShadowStyle({
    ...themeShadowColors(theme),
    elevation: ELEVATION.default,
    lightSource: 'top-left',
    shapeVariant,
    cornerStyle: roundedCorner(DEFAULT_RADIUS),
  });
}

export const defaultFlatStyle = (theme: ThemeName): ShadowStyle => defaultStyle(theme, 'flat');

export const defaultPressedStyle = (theme: ThemeName): ShadowStyle => defaultStyle(theme, 'pressed');
