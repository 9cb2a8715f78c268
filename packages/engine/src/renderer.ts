import { DEFAULT_RENDER_TUNING, type RenderTuning } from './config.js';
import { inflateRect, outlineBounds, resolveOutline, sameRect, translateOutline } from './geometry.js';
import { isZeroOffset, resolveOffsets } from './light-source.js';
import type { DrawScope, ShadowDrawCommand, ShadowLayer } from './surface.js';
import type { CornerStyle, Outline, OffsetPair, Rect, Rgba, ShadowStyle, Vec2 } from './types.js';

/**
 * Everything the two draw orders need, computed once per pass.
 * Null means there is nothing to shade: the pass only draws content.
 */
interface ShadowPlan {
  readonly bounds: Rect;
  readonly outline: Outline;
  readonly offsets: OffsetPair;
  readonly blurRadius: number;
  readonly style: ShadowStyle;
}

export interface RenderOptions {
  readonly tuning?: RenderTuning;
  /**
   * Precomputed outline for `scope.bounds` and the style's corner style.
   * Ignored when its bounding box differs from `scope.bounds`.
   */
  readonly outline?: Outline;
}

/**
 * Draw one neumorphic pass: two shadow layers plus the wrapped content.
 *
 * Flat shapes paint the shadows outside the outline and then the content over
 * them. Pressed shapes paint the content first and then the inset shadows.
 * `drawContent` runs exactly once in every case, including degenerate bounds
 * and zero elevation, where no shadow is issued.
 */
export function renderNeumorphic(scope: DrawScope, style: ShadowStyle, options: RenderOptions = {}): void {
  switch (style.shapeVariant) {
    case 'pressed': {
      const plan = planShadows(scope.bounds, style, options.outline, options.tuning);
      scope.drawContent();
      if (plan) {
        drawForegroundShadows(scope, plan);
      }
      return;
    }
    case 'flat': {
      const plan = planShadows(scope.bounds, style, options.outline, options.tuning);
      if (plan) {
        drawBackgroundShadows(scope, plan, options.tuning ?? DEFAULT_RENDER_TUNING);
      }
      scope.drawContent();
      return;
    }
    default: {
      // Unrecognized variants render as a flat square
      const fallback: ShadowStyle = { ...style, shapeVariant: 'flat', cornerStyle: SQUARE };
      const plan = planShadows(scope.bounds, fallback, undefined, options.tuning);
      if (plan) {
        drawBackgroundShadows(scope, plan, options.tuning ?? DEFAULT_RENDER_TUNING);
      }
      scope.drawContent();
    }
  }
}

const SQUARE: CornerStyle = Object.freeze({ kind: 'rounded', radius: 0 });

function planShadows(
  bounds: Rect,
  style: ShadowStyle,
  precomputed: Outline | undefined,
  tuning: RenderTuning = DEFAULT_RENDER_TUNING,
): ShadowPlan | null {
  const outline = outlineFor(bounds, style, precomputed);
  if (outline.kind === 'empty') {
    return null;
  }
  const offsets = resolveOffsets(style.lightSource, style.elevation);
  if (isZeroOffset(offsets)) {
    return null;
  }
  return {
    bounds,
    outline,
    offsets,
    blurRadius: style.elevation * tuning.blurFactor,
    style,
  };
}

/** A precomputed outline is only trusted when it was built for these bounds */
function outlineFor(bounds: Rect, style: ShadowStyle, precomputed: Outline | undefined): Outline {
  const precomputedBounds = precomputed ? outlineBounds(precomputed) : null;
  if (precomputed && precomputedBounds && sameRect(precomputedBounds, bounds)) {
    return precomputed;
  }
  return resolveOutline(bounds, style.cornerStyle);
}

/** Shadows behind the shape, dark first */
function drawBackgroundShadows(scope: DrawScope, plan: ShadowPlan, tuning: RenderTuning): void {
  const limit = inflateRect(plan.bounds, plan.style.elevation + plan.blurRadius * tuning.clipMarginFactor);
  const clip = { kind: 'outside', outline: plan.outline, limit } as const;

  scope.surface.fillShadow(
    shadowCommand(plan, 'dark', plan.style.darkColor, plan.offsets.darkOffset, clip, 'solid'),
  );
  scope.surface.fillShadow(
    shadowCommand(plan, 'light', plan.style.lightColor, plan.offsets.lightOffset, clip, 'solid'),
  );
}

/** Inset shadows over the content, light first */
function drawForegroundShadows(scope: DrawScope, plan: ShadowPlan): void {
  const clip = { kind: 'inside', outline: plan.outline } as const;

  scope.surface.fillShadow(
    shadowCommand(plan, 'light', plan.style.lightColor, plan.offsets.lightOffset, clip, 'inverse'),
  );
  scope.surface.fillShadow(
    shadowCommand(plan, 'dark', plan.style.darkColor, plan.offsets.darkOffset, clip, 'inverse'),
  );
}

function shadowCommand(
  plan: ShadowPlan,
  layer: ShadowLayer,
  color: Rgba,
  offset: Vec2,
  clip: ShadowDrawCommand['clip'],
  mode: ShadowDrawCommand['mode'],
): ShadowDrawCommand {
  return {
    layer,
    outline: translateOutline(plan.outline, offset.dx, offset.dy),
    offset,
    paint: { color, blurRadius: plan.blurRadius },
    clip,
    mode,
  };
}
