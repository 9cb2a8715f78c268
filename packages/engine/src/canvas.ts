/**
 * Canvas 2D surface.
 *
 * Blur comes from the canvas shadow: the shape is drawn far off-screen and
 * only its shadow, shifted back by the same distance, lands in view. Clips use
 * even-odd paths so "outside the outline" is a rect with a hole.
 */

import { formatColor } from '@softrelief/design-tokens';
import { inflateRect } from './geometry.js';
import type { DrawScope, DrawSurface, ShadowDrawCommand } from './surface.js';
import type { Outline, Rect } from './types.js';

export type CanvasFillRule = 'nonzero' | 'evenodd';

/** The part of CanvasRenderingContext2D this surface uses */
export interface Canvas2DLike {
  fillStyle: unknown;
  shadowColor: string;
  shadowBlur: number;
  shadowOffsetX: number;
  shadowOffsetY: number;
  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  arcTo(x1: number, y1: number, x2: number, y2: number, radius: number): void;
  rect(x: number, y: number, w: number, h: number): void;
  ellipse(
    x: number,
    y: number,
    radiusX: number,
    radiusY: number,
    rotation: number,
    startAngle: number,
    endAngle: number,
  ): void;
  clip(fillRule?: CanvasFillRule): void;
  fill(fillRule?: CanvasFillRule): void;
  /** Current user-to-device matrix; a DOMMatrix satisfies it */
  getTransform?(): CanvasMatrix;
}

/** Linear part of a 2D affine matrix */
export interface CanvasMatrix {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

export interface CanvasSurfaceOptions {
  /**
   * Device pixels per user unit. Shadow offset and blur ignore the context
   * transform, so they must be scaled to match it. When unset, the scale is
   * read from `ctx.getTransform()`; a context without it is taken as unscaled.
   */
  readonly pixelRatio?: number;
}

/** Far enough that the caster never overlaps the visible shadow */
export const FAR_OFFSET = 10000;

export function traceOutline(ctx: Canvas2DLike, outline: Outline): void {
  switch (outline.kind) {
    case 'empty':
      return;
    case 'oval': {
      const { x, y, width, height } = outline.rect;
      ctx.moveTo(x + width, y + height / 2);
      ctx.ellipse(x + width / 2, y + height / 2, width / 2, height / 2, 0, 0, Math.PI * 2);
      ctx.closePath();
      return;
    }
    case 'rounded-rect': {
      const { x, y, width, height } = outline.rect;
      const r = outline.radius;
      if (r <= 0) {
        ctx.rect(x, y, width, height);
        return;
      }
      ctx.moveTo(x + r, y);
      ctx.arcTo(x + width, y, x + width, y + height, r);
      ctx.arcTo(x + width, y + height, x, y + height, r);
      ctx.arcTo(x, y + height, x, y, r);
      ctx.arcTo(x, y, x + width, y, r);
      ctx.closePath();
    }
  }
}

interface ShadowScale {
  readonly offsetX: number;
  readonly offsetY: number;
  readonly blur: number;
}

export class CanvasSurface implements DrawSurface {
  private readonly pixelRatio: number | null;

  constructor(
    private readonly ctx: Canvas2DLike,
    options: CanvasSurfaceOptions = {},
  ) {
    const ratio = options.pixelRatio;
    this.pixelRatio = ratio !== undefined && Number.isFinite(ratio) && ratio > 0 ? ratio : null;
  }

  fillShadow(command: ShadowDrawCommand): void {
    if (command.outline.kind === 'empty') {
      return;
    }
    const ctx = this.ctx;
    ctx.save();
    try {
      this.applyClip(command);

      const scale = this.shadowScale();
      ctx.fillStyle = '#000';
      ctx.shadowColor = formatColor(command.paint.color);
      ctx.shadowBlur = command.paint.blurRadius * scale.blur;
      ctx.shadowOffsetX = FAR_OFFSET * scale.offsetX;
      ctx.shadowOffsetY = FAR_OFFSET * scale.offsetY;
      ctx.translate(-FAR_OFFSET, -FAR_OFFSET);

      ctx.beginPath();
      if (command.mode === 'inverse') {
        // Frame around the translated outline; its shadow falls inward
        ctx.rect(...rectArgs(inflateRect(command.outline.rect, frameMargin(command))));
        traceOutline(ctx, command.outline);
        ctx.fill('evenodd');
      } else {
        traceOutline(ctx, command.outline);
        ctx.fill('nonzero');
      }
    } finally {
      ctx.restore();
    }
  }

  /**
   * Device-space factors that bring the shadow of a caster translated by
   * (-FAR_OFFSET, -FAR_OFFSET) user units back onto the shape
   */
  private shadowScale(): ShadowScale {
    if (this.pixelRatio !== null) {
      return { offsetX: this.pixelRatio, offsetY: this.pixelRatio, blur: this.pixelRatio };
    }
    const m = this.ctx.getTransform?.();
    if (!m) {
      return { offsetX: 1, offsetY: 1, blur: 1 };
    }
    return {
      offsetX: m.a + m.c,
      offsetY: m.b + m.d,
      blur: Math.sqrt(Math.abs(m.a * m.d - m.b * m.c)),
    };
  }

  private applyClip(command: ShadowDrawCommand): void {
    const ctx = this.ctx;
    const clip = command.clip;
    ctx.beginPath();
    if (clip.kind === 'outside') {
      ctx.rect(...rectArgs(clip.limit));
      traceOutline(ctx, clip.outline);
      ctx.clip('evenodd');
    } else {
      traceOutline(ctx, clip.outline);
      ctx.clip('nonzero');
    }
  }
}

function frameMargin(command: ShadowDrawCommand): number {
  return command.paint.blurRadius * 2 + Math.abs(command.offset.dx) + Math.abs(command.offset.dy) + 1;
}

const rectArgs = (rect: Rect): [number, number, number, number] => [rect.x, rect.y, rect.width, rect.height];

/**
 * Scope for drawing a node on a 2D canvas
 */
export function canvasScope(
  ctx: Canvas2DLike,
  bounds: Rect,
  drawContent: () => void,
  options?: CanvasSurfaceOptions,
): DrawScope {
  return { bounds, surface: new CanvasSurface(ctx, options), drawContent };
}
