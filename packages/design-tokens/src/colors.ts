/**
 * Color tokens for the Softrelief neumorphic palette
 * Consumed by the rendering engine and by host themes
 *
 * NO platform-specific code - raw values only
 */

/**
 * Shadow pair per theme
 * `light` is the highlight cast toward the light source, `dark` the shade cast away from it
 */
export const NEU_SHADOW = {
  light: {
    light: '#FFFFFF',
    dark: '#A8B5C7',
  },
  dark: {
    light: 'rgba(73, 73, 73, 0.4)',
    dark: 'rgba(0, 0, 0, 0.4)',
  },
} as const;

// Type exports for type inference
export type ThemeName = keyof typeof NEU_SHADOW;
export type ShadowPair = (typeof NEU_SHADOW)[ThemeName];
