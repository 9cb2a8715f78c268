import type { RenderTuning } from './config.js';
import { resolveOutline, sameCornerStyle, sameRect } from './geometry.js';
import { renderNeumorphic } from './renderer.js';
import { createShadowStyle, type ColorInput } from './style.js';
import type { DrawScope } from './surface.js';
import type { CornerStyle, LightSource, NeuShape, Outline, Rect, ShadowStyle } from './types.js';

/** Field-wise form of a style, named the way widget code passes it */
export interface NeuAttrs {
  readonly lightShadowColor: ColorInput;
  readonly darkShadowColor: ColorInput;
  readonly shadowElevation: number;
  readonly lightSource: LightSource;
  readonly shape: NeuShape;
}

export interface NeuOptions {
  readonly tuning?: RenderTuning;
}

interface OutlineMemo {
  readonly bounds: Rect;
  readonly cornerStyle: CornerStyle;
  readonly outline: Outline;
}

/**
 * A draw effect bound to one style, attachable to any node that can hand it
 * a DrawScope. Holds only its own last outline between frames.
 */
export class NeuEffect {
  private memo: OutlineMemo | null = null;

  constructor(
    readonly style: ShadowStyle,
    private readonly options: NeuOptions = {},
  ) {}

  draw(scope: DrawScope): void {
    renderNeumorphic(scope, this.style, {
      tuning: this.options.tuning,
      outline: this.outlineFor(scope.bounds),
    });
  }

  private outlineFor(bounds: Rect): Outline {
    const { cornerStyle } = this.style;
    const memo = this.memo;
    if (memo && sameRect(memo.bounds, bounds) && sameCornerStyle(memo.cornerStyle, cornerStyle)) {
      return memo.outline;
    }
    const outline = resolveOutline(bounds, cornerStyle);
    this.memo = { bounds: { ...bounds }, cornerStyle, outline };
    return outline;
  }
}

const isAttrs = (input: ShadowStyle | NeuAttrs): input is NeuAttrs => 'shape' in input;

/**
 * Attach a neumorphic effect.
 *
 * ```ts
 * const effect = neu({
 *   lightShadowColor: '#FFFFFF',
 *   darkShadowColor: '#A8B5C7',
 *   shadowElevation: 6,
 *   lightSource: LightSource.TOP_LEFT,
 *   shape: pressed(roundedCorner(12)),
 * });
 * effect.draw(canvasScope(ctx, { x: 0, y: 0, width: 200, height: 48 }, drawButton));
 * ```
 */
export function neu(style: ShadowStyle, options?: NeuOptions): NeuEffect;
export function neu(attrs: NeuAttrs, options?: NeuOptions): NeuEffect;
export function neu(input: ShadowStyle | NeuAttrs, options: NeuOptions = {}): NeuEffect {
  if (!isAttrs(input)) {
    return new NeuEffect(input, options);
  }
  const style = createShadowStyle({
    lightColor: input.lightShadowColor,
    darkColor: input.darkShadowColor,
    elevation: input.shadowElevation,
    lightSource: input.lightSource,
    shapeVariant: input.shape.shapeVariant,
    cornerStyle: input.shape.cornerStyle,
  });
  return new NeuEffect(style, options);
}
