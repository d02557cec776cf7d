export const DEFAULT_WIDTH = 64;
export const DEFAULT_HEIGHT = 64;
export const MAX_SIDE = 4096;

// --- Cell Encoding ---
// One byte per cell, row-major: index = row * width + column
export const DEAD = 0;
export const ALIVE = 1;

export const DEAD_GLYPH = "◻";
export const ALIVE_GLYPH = "◼";
