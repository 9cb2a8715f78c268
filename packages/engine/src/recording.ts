import type { DrawScope, DrawSurface, ShadowDrawCommand } from './surface.js';
import type { Rect } from './types.js';

export type DrawEvent =
  | { readonly type: 'shadow'; readonly command: ShadowDrawCommand }
  | { readonly type: 'content' };

/**
 * Surface that keeps every command instead of painting it.
 * Used for hit-testing layouts, server-side previews and tests.
 */
export class RecordingSurface implements DrawSurface {
  private readonly log: DrawEvent[] = [];

  fillShadow(command: ShadowDrawCommand): void {
    this.log.push({ type: 'shadow', command });
  }

  markContent(): void {
    this.log.push({ type: 'content' });
  }

  get events(): readonly DrawEvent[] {
    return this.log;
  }

  get commands(): ShadowDrawCommand[] {
    const commands: ShadowDrawCommand[] = [];
    for (const event of this.log) {
      if (event.type === 'shadow') {
        commands.push(event.command);
      }
    }
    return commands;
  }

  clear(): void {
    this.log.length = 0;
  }
}

/**
 * Scope over a recording surface; each content draw is logged before
 * `drawContent` runs.
 */
export function recordingScope(
  bounds: Rect,
  surface: RecordingSurface = new RecordingSurface(),
  drawContent: () => void = () => undefined,
): DrawScope & { readonly surface: RecordingSurface } {
  return {
    bounds,
    surface,
    drawContent() {
      surface.markContent();
      drawContent();
    },
  };
}
