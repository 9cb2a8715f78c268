import { describe, it, expect, vi } from 'vitest';
import {
  CanvasSurface,
  FAR_OFFSET,
  canvasScope,
  type Canvas2DLike,
  type CanvasFillRule,
  type CanvasMatrix,
} from '../src/canvas.js';
import { renderNeumorphic } from '../src/renderer.js';
import { EMPTY_OUTLINE } from '../src/geometry.js';
import { defaultPressedStyle } from '../src/presets.js';
import type { ShadowDrawCommand } from '../src/surface.js';

type Op = [string, ...unknown[]];

/** Records every call and property write in order */
class FakeCanvas implements Canvas2DLike {
  readonly ops: Op[] = [];
  private values: Record<string, unknown> = {};

  private record(name: string, value: unknown): void {
    this.values[name] = value;
    this.ops.push([name, value]);
  }

  get fillStyle(): unknown {
    return this.values.fillStyle;
  }
  set fillStyle(value: unknown) {
    this.record('fillStyle', value);
  }
  get shadowColor(): string {
    return String(this.values.shadowColor ?? '');
  }
  set shadowColor(value: string) {
    this.record('shadowColor', value);
  }
  get shadowBlur(): number {
    return Number(this.values.shadowBlur ?? 0);
  }
  set shadowBlur(value: number) {
    this.record('shadowBlur', value);
  }
  get shadowOffsetX(): number {
    return Number(this.values.shadowOffsetX ?? 0);
  }
  set shadowOffsetX(value: number) {
    this.record('shadowOffsetX', value);
  }
  get shadowOffsetY(): number {
    return Number(this.values.shadowOffsetY ?? 0);
  }
  set shadowOffsetY(value: number) {
    this.record('shadowOffsetY', value);
  }

  save = vi.fn(() => this.ops.push(['save']));
  restore = vi.fn(() => this.ops.push(['restore']));
  translate = vi.fn((x: number, y: number) => this.ops.push(['translate', x, y]));
  beginPath = vi.fn(() => this.ops.push(['beginPath']));
  closePath = vi.fn(() => this.ops.push(['closePath']));
  moveTo = vi.fn((x: number, y: number) => this.ops.push(['moveTo', x, y]));
  arcTo = vi.fn((x1: number, y1: number, x2: number, y2: number, r: number) =>
    this.ops.push(['arcTo', x1, y1, x2, y2, r]),
  );
  rect = vi.fn((x: number, y: number, w: number, h: number) => this.ops.push(['rect', x, y, w, h]));
  ellipse = vi.fn((x: number, y: number, rx: number, ry: number, rot: number, start: number, end: number) =>
    this.ops.push(['ellipse', x, y, rx, ry, rot, start, end]),
  );
  clip = vi.fn((rule?: CanvasFillRule) => this.ops.push(['clip', rule]));
  fill = vi.fn((rule?: CanvasFillRule) => this.ops.push(['fill', rule]));
}

/** Canvas whose context carries a user-to-device transform */
class TransformedCanvas extends FakeCanvas {
  constructor(private readonly matrix: CanvasMatrix) {
    super();
  }

  getTransform(): CanvasMatrix {
    return this.matrix;
  }
}

const bounds = { x: 0, y: 0, width: 100, height: 100 };
const outline = { kind: 'rounded-rect', rect: bounds, radius: 12 } as const;

const flatDark: ShadowDrawCommand = {
  layer: 'dark',
  outline: { kind: 'rounded-rect', rect: { x: 6, y: 6, width: 100, height: 100 }, radius: 12 },
  offset: { dx: 6, dy: 6 },
  paint: { color: { r: 168, g: 181, b: 199, a: 1 }, blurRadius: 6 },
  clip: { kind: 'outside', outline, limit: { x: -18, y: -18, width: 136, height: 136 } },
  mode: 'solid',
};

describe('CanvasSurface', () => {
  it('clips outside the outline and casts a far-offset shadow of the translated outline', () => {
    const ctx = new FakeCanvas();
    new CanvasSurface(ctx).fillShadow(flatDark);

    expect(ctx.ops).toEqual([
      ['save'],
      ['beginPath'],
      ['rect', -18, -18, 136, 136],
      ['moveTo', 12, 0],
      ['arcTo', 100, 0, 100, 100, 12],
      ['arcTo', 100, 100, 0, 100, 12],
      ['arcTo', 0, 100, 0, 0, 12],
      ['arcTo', 0, 0, 100, 0, 12],
      ['closePath'],
      ['clip', 'evenodd'],
      ['fillStyle', '#000'],
      ['shadowColor', 'rgba(168, 181, 199, 1)'],
      ['shadowBlur', 6],
      ['shadowOffsetX', FAR_OFFSET],
      ['shadowOffsetY', FAR_OFFSET],
      ['translate', -FAR_OFFSET, -FAR_OFFSET],
      ['beginPath'],
      ['moveTo', 18, 6],
      ['arcTo', 106, 6, 106, 106, 12],
      ['arcTo', 106, 106, 6, 106, 12],
      ['arcTo', 6, 106, 6, 6, 12],
      ['arcTo', 6, 6, 106, 6, 12],
      ['closePath'],
      ['fill', 'nonzero'],
      ['restore'],
    ]);
  });

  it('paints a frame around an inset oval and clips inside the outline', () => {
    const ctx = new FakeCanvas();
    const oval = { kind: 'oval', rect: { x: 0, y: 0, width: 48, height: 48 } } as const;
    new CanvasSurface(ctx).fillShadow({
      layer: 'light',
      outline: { kind: 'oval', rect: { x: -6, y: -6, width: 48, height: 48 } },
      offset: { dx: -6, dy: -6 },
      paint: { color: { r: 255, g: 255, b: 255, a: 1 }, blurRadius: 6 },
      clip: { kind: 'inside', outline: oval },
      mode: 'inverse',
    });

    expect(ctx.ops).toEqual([
      ['save'],
      ['beginPath'],
      ['moveTo', 48, 24],
      ['ellipse', 24, 24, 24, 24, 0, 0, Math.PI * 2],
      ['closePath'],
      ['clip', 'nonzero'],
      ['fillStyle', '#000'],
      ['shadowColor', 'rgba(255, 255, 255, 1)'],
      ['shadowBlur', 6],
      ['shadowOffsetX', FAR_OFFSET],
      ['shadowOffsetY', FAR_OFFSET],
      ['translate', -FAR_OFFSET, -FAR_OFFSET],
      ['beginPath'],
      ['rect', -31, -31, 98, 98],
      ['moveTo', 42, 18],
      ['ellipse', 18, 18, 24, 24, 0, 0, Math.PI * 2],
      ['closePath'],
      ['fill', 'evenodd'],
      ['restore'],
    ]);
  });

  it('traces a square rectangle when the radius is 0', () => {
    const ctx = new FakeCanvas();
    new CanvasSurface(ctx).fillShadow({
      ...flatDark,
      outline: { kind: 'rounded-rect', rect: { x: 6, y: 6, width: 100, height: 100 }, radius: 0 },
    });
    expect(ctx.rect).toHaveBeenCalledWith(6, 6, 100, 100);
    expect(ctx.arcTo).toHaveBeenCalledTimes(4);
  });

  it('scales shadow blur and offset by the pixel ratio', () => {
    const ctx = new FakeCanvas();
    new CanvasSurface(ctx, { pixelRatio: 2 }).fillShadow(flatDark);
    expect(ctx.shadowBlur).toBe(12);
    expect(ctx.shadowOffsetX).toBe(FAR_OFFSET * 2);
    expect(ctx.shadowOffsetY).toBe(FAR_OFFSET * 2);
    expect(ctx.translate).toHaveBeenCalledWith(-FAR_OFFSET, -FAR_OFFSET);
  });

  it('ignores an invalid pixel ratio', () => {
    const ctx = new FakeCanvas();
    new CanvasSurface(ctx, { pixelRatio: 0 }).fillShadow(flatDark);
    expect(ctx.shadowBlur).toBe(6);
  });

  it('reads the scale from the context transform when no pixel ratio is given', () => {
    const ctx = new TransformedCanvas({ a: 2, b: 0, c: 0, d: 2 });
    new CanvasSurface(ctx).fillShadow(flatDark);
    expect(ctx.shadowBlur).toBe(12);
    expect(ctx.shadowOffsetX).toBe(FAR_OFFSET * 2);
    expect(ctx.shadowOffsetY).toBe(FAR_OFFSET * 2);
  });

  it('follows a non-uniform context scale per axis', () => {
    const ctx = new TransformedCanvas({ a: 3, b: 0, c: 0, d: 1 });
    new CanvasSurface(ctx).fillShadow(flatDark);
    expect(ctx.shadowOffsetX).toBe(FAR_OFFSET * 3);
    expect(ctx.shadowOffsetY).toBe(FAR_OFFSET);
    expect(ctx.shadowBlur).toBeCloseTo(6 * Math.sqrt(3), 10);
  });

  it('prefers an explicit pixel ratio over the context transform', () => {
    const ctx = new TransformedCanvas({ a: 2, b: 0, c: 0, d: 2 });
    new CanvasSurface(ctx, { pixelRatio: 1 }).fillShadow(flatDark);
    expect(ctx.shadowBlur).toBe(6);
    expect(ctx.shadowOffsetX).toBe(FAR_OFFSET);
  });

  it('skips empty outlines', () => {
    const ctx = new FakeCanvas();
    new CanvasSurface(ctx).fillShadow({ ...flatDark, outline: EMPTY_OUTLINE });
    expect(ctx.ops).toEqual([]);
  });
});

describe('canvasScope', () => {
  it('balances save and restore around each shadow of a full pass', () => {
    const ctx = new FakeCanvas();
    const drawContent = vi.fn(() => ctx.ops.push(['content']));

    renderNeumorphic(canvasScope(ctx, bounds, drawContent), defaultPressedStyle('light'));

    expect(drawContent).toHaveBeenCalledTimes(1);
    expect(ctx.save).toHaveBeenCalledTimes(2);
    expect(ctx.restore).toHaveBeenCalledTimes(2);
    expect(ctx.ops[0]).toEqual(['content']);
    expect(ctx.ops.filter((op) => op[0] === 'fill')).toEqual([
      ['fill', 'evenodd'],
      ['fill', 'evenodd'],
    ]);
  });
});
