import type { LightSource, OffsetPair, Vec2 } from './types.js';

/** Sign of the light shadow offset on each axis */
const LIGHT_DIRECTION: Record<LightSource, { readonly x: -1 | 1; readonly y: -1 | 1 }> = {
  'top-left': { x: -1, y: -1 },
  'top-right': { x: 1, y: -1 },
  'bottom-left': { x: -1, y: 1 },
  'bottom-right': { x: 1, y: 1 },
};

const ZERO: Vec2 = Object.freeze({ dx: 0, dy: 0 });

export const ZERO_OFFSETS: OffsetPair = Object.freeze({ lightOffset: ZERO, darkOffset: ZERO });

/**
 * Map a light source and elevation to the two shadow displacements.
 * The dark offset is always the negation of the light offset; elevation <= 0
 * (or not finite) gives zero offsets.
 */
export function resolveOffsets(lightSource: LightSource, elevation: number): OffsetPair {
  if (!Number.isFinite(elevation) || elevation <= 0) {
    return ZERO_OFFSETS;
  }
  const direction = LIGHT_DIRECTION[lightSource] ?? LIGHT_DIRECTION['top-left'];
  const lightOffset: Vec2 = { dx: direction.x * elevation, dy: direction.y * elevation };
  return {
    lightOffset,
    darkOffset: { dx: -lightOffset.dx, dy: -lightOffset.dy },
  };
}

export function isZeroOffset(offsets: OffsetPair): boolean {
  return offsets.lightOffset.dx === 0 && offsets.lightOffset.dy === 0;
}
