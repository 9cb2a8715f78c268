// Barrel export for @softrelief/engine
export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './geometry.js';
export * from './light-source.js';
export * from './renderer.js';
export * from './style.js';
export * from './validation.js';
export * from './presets.js';
export * from './modifier.js';
export * from './recording.js';
export * from './canvas.js';
export type {
  ClipRegion,
  DrawScope,
  DrawSurface,
  FillMode,
  ShadowDrawCommand,
  ShadowLayer,
  ShadowPaint,
} from './surface.js';
export { logDebug, logInfo, logWarn, logError, type LogLevel } from './logger.js';
