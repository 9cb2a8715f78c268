import type { CornerStyle, Outline, Rect } from './types.js';

export const EMPTY_OUTLINE: Outline = Object.freeze({ kind: 'empty' });

const isUsable = (n: number): boolean => Number.isFinite(n) && n > 0;

/**
 * Build the outline path for a shape inside `bounds`.
 * Degenerate bounds give an empty outline; a corner radius is clamped to
 * [0, min(width, height) / 2].
 */
export function resolveOutline(bounds: Rect, cornerStyle: CornerStyle): Outline {
  if (!isUsable(bounds.width) || !isUsable(bounds.height)) {
    return EMPTY_OUTLINE;
  }
  const rect: Rect = { x: bounds.x, y: bounds.y, width: bounds.width, height: bounds.height };

  switch (cornerStyle.kind) {
    case 'oval':
      return { kind: 'oval', rect };
    case 'rounded':
      return { kind: 'rounded-rect', rect, radius: clampRadius(cornerStyle.radius, rect) };
    default:
      // Unknown corner kinds arriving from untyped callers render square
      return { kind: 'rounded-rect', rect, radius: 0 };
  }
}

export function clampRadius(radius: number, rect: Rect): number {
  // +Infinity is just an oversized radius
  if (Number.isNaN(radius) || radius <= 0) {
    return 0;
  }
  return Math.min(radius, Math.min(rect.width, rect.height) / 2);
}

/** Bounding box of an outline, or null when it is empty */
export function outlineBounds(outline: Outline): Rect | null {
  return outline.kind === 'empty' ? null : outline.rect;
}

export function translateOutline(outline: Outline, dx: number, dy: number): Outline {
  if (outline.kind === 'empty') {
    return outline;
  }
  const rect = translateRect(outline.rect, dx, dy);
  return outline.kind === 'oval' ? { kind: 'oval', rect } : { kind: 'rounded-rect', rect, radius: outline.radius };
}

export function translateRect(rect: Rect, dx: number, dy: number): Rect {
  return { x: rect.x + dx, y: rect.y + dy, width: rect.width, height: rect.height };
}

export function inflateRect(rect: Rect, amount: number): Rect {
  return {
    x: rect.x - amount,
    y: rect.y - amount,
    width: rect.width + amount * 2,
    height: rect.height + amount * 2,
  };
}

export function sameRect(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function sameCornerStyle(a: CornerStyle, b: CornerStyle): boolean {
  if (a.kind === 'oval' || b.kind === 'oval') {
    return a.kind === b.kind;
  }
  return a.radius === b.radius;
}
