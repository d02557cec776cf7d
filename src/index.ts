export { Universe } from "./lib/life/universe";
export { InvalidConfigError, InvalidDimensionsError } from "./lib/life/errors";
export {
  UniverseConfigSchema,
  type UniverseConfig,
  type UniverseOptions,
} from "./lib/life/config";
export {
  ALIVE_GLYPH,
  DEAD_GLYPH,
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
} from "./lib/life/life.shared";
export {
  emptySeed,
  modularSeed,
  randomSeed,
  type SeedRule,
} from "./lib/life/seed";
export { seeds, seedNames, SeedNameSchema, type SeedName } from "./consts";
export {
  DEFAULT_CANVAS_STYLE,
  canvasPainter,
  canvasSize,
  drawCells,
  drawGrid,
  type CanvasStyle,
  type LifeSurface,
} from "./lib/life/canvas";
export {
  animationFrames,
  runLife,
  textPainter,
  type FrameScheduler,
  type LifeAnimation,
  type LifePainter,
} from "./lib/life/life";
