/**
 * Color string parsing shared by tokens and the engine.
 * Runtime-safe (no DOM dependencies).
 */

export interface ParsedColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_PATTERN = /^rgba?\(\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*(?:,\s*(\d*\.?\d+)\s*)?\)$/i;

const channel = (hex: string): number => parseInt(hex.length === 1 ? hex + hex : hex, 16);

/**
 * Parse a color string to RGBA channels
 * Supports hex (#RGB, #RGBA, #RRGGBB, #RRGGBBAA), rgb(r,g,b) and rgba(r,g,b,a)
 * @returns null when the string is not a supported color or a channel is out of range
 */
export function parseColor(color: string): ParsedColor | null {
  const value = color.trim();

  const hexMatch = value.match(HEX_PATTERN);
  if (hexMatch) {
    const hex = hexMatch[1];
    if (hex.length === 3 || hex.length === 4) {
      return {
        r: channel(hex[0]),
        g: channel(hex[1]),
        b: channel(hex[2]),
        a: hex.length === 4 ? channel(hex[3]) / 255 : 1,
      };
    }
    return {
      r: channel(hex.slice(0, 2)),
      g: channel(hex.slice(2, 4)),
      b: channel(hex.slice(4, 6)),
      a: hex.length === 8 ? channel(hex.slice(6, 8)) / 255 : 1,
    };
  }

  const rgbMatch = value.match(RGB_PATTERN);
  if (rgbMatch) {
    const r = parseInt(rgbMatch[1], 10);
    const g = parseInt(rgbMatch[2], 10);
    const b = parseInt(rgbMatch[3], 10);
    const a = rgbMatch[4] !== undefined ? parseFloat(rgbMatch[4]) : 1;
    if (r > 255 || g > 255 || b > 255 || Number.isNaN(a) || a > 1) {
      return null;
    }
    return { r, g, b, a };
  }

  return null;
}

/**
 * Format channels back to a CSS rgba() string
 */
export function formatColor({ r, g, b, a }: ParsedColor): string {
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}
