// ── Grid ──

/** Number of columns in the default grid. */
export const GRID_WIDTH = 64;

/** Number of rows in the default grid. */
export const GRID_HEIGHT = 64;

// ── Simulation ──

/** Default generations executed per second of wall-clock time. */
export const DEFAULT_GENERATIONS_PER_SECOND = 10;

/** Choices offered by the speed selector, in generations per second. */
export const SPEED_OPTIONS = [1, 2, 5, 10, 20, 30, 60];

// ── Rendering ──

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 60;

/** Side of one cell in pixels, excluding the 1px grid line. */
export const CELL_SIZE = 10;

/** Grid line color. */
export const GRID_COLOR = 0xcccccc;

/** Fill color for dead cells. */
export const DEAD_COLOR = 0xffffff;

/** Fill color for live cells. */
export const ALIVE_COLOR = 0x000000;

/** Glyph for a dead cell in the text view. */
export const DEAD_GLYPH = "◻";

/** Glyph for a live cell in the text view. */
export const ALIVE_GLYPH = "◼";
