/**
 * Contract between the renderer and whatever it paints on.
 * A surface receives fully computed shadow commands; it never sees a style.
 */

import type { Outline, Rect, Rgba, Vec2 } from './types.js';

export type ShadowLayer = 'light' | 'dark';

export interface ShadowPaint {
  readonly color: Rgba;
  readonly blurRadius: number;
}

/**
 * Where a shadow may show.
 * `outside`: inside `limit` but not inside `outline`.
 * `inside`: inside `outline` only.
 */
export type ClipRegion =
  | { readonly kind: 'outside'; readonly outline: Outline; readonly limit: Rect }
  | { readonly kind: 'inside'; readonly outline: Outline };

/**
 * `solid` paints the translated outline itself.
 * `inverse` paints everything outside the translated outline, so the blur falls
 * inward from the edge of an inset shape.
 */
export type FillMode = 'solid' | 'inverse';

export interface ShadowDrawCommand {
  readonly layer: ShadowLayer;
  /** Outline already translated by `offset` */
  readonly outline: Outline;
  readonly offset: Vec2;
  readonly paint: ShadowPaint;
  readonly clip: ClipRegion;
  readonly mode: FillMode;
}

export interface DrawSurface {
  fillShadow(command: ShadowDrawCommand): void;
}

/**
 * What one draw pass hands to the renderer.
 * The renderer reads `bounds`, issues commands to `surface` and calls
 * `drawContent` exactly once. It keeps no reference after returning.
 */
export interface DrawScope {
  readonly bounds: Rect;
  readonly surface: DrawSurface;
  drawContent(): void;
}
