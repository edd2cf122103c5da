import { Cell } from "../types/grid-types";

/** Initial state of the cell at a row-major buffer index. */
export type SeedRule = (index: number) => Cell;

export type SeedPreset = "demo" | "empty" | "glider" | "blinker" | "r-pentomino" | "glider-gun";

/** Alive where the index is a multiple of 2 or 7. Dense enough to keep the grid busy. */
export const demoSeed: SeedRule = (i) => (i % 2 === 0 || i % 7 === 0 ? Cell.Alive : Cell.Dead);

export const emptySeed: SeedRule = () => Cell.Dead;

/** Patterns as rows of "O" (alive) and "." (dead). */
const PATTERNS: Record<Exclude<SeedPreset, "demo" | "empty">, readonly string[]> = {
  "glider": [
    ".O.",
    "..O",
    "OOO",
  ],
  "blinker": [
    "OOO",
  ],
  "r-pentomino": [
    ".OO",
    "OO.",
    ".O.",
  ],
  "glider-gun": [
    "........................O...........",
    "......................O.O...........",
    "............OO......OO............OO",
    "...........O...O....OO............OO",
    "OO........O.....O...OO..............",
    "OO........O...O.OO....O.O...........",
    "..........O.....O.......O...........",
    "...........O...O....................",
    "............OO......................",
  ],
};

function wrap(n: number, size: number): number {
  return ((n % size) + size) % size;
}

/** Alive exactly at the listed [row, col] pairs. Coordinates wrap around the grid. */
export function liveCellsSeed(width: number, height: number, cells: ReadonlyArray<readonly [number, number]>): SeedRule {
  const alive = new Set<number>();
  for (const [r, c] of cells) {
    alive.add(wrap(r, height) * width + wrap(c, width));
  }
  return (i) => (alive.has(i) ? Cell.Alive : Cell.Dead);
}

/**
 * Draws a pattern with its top-left corner at `origin`, or centered when no
 * origin is given. Parts of the pattern past an edge wrap to the other side.
 */
export function patternSeed(
  width: number,
  height: number,
  pattern: readonly string[],
  origin?: { row: number; col: number },
): SeedRule {
  const patternWidth = Math.max(0, ...pattern.map(line => line.length));
  const top = origin?.row ?? Math.floor((height - pattern.length) / 2);
  const left = origin?.col ?? Math.floor((width - patternWidth) / 2);

  const cells: [number, number][] = [];
  pattern.forEach((line, r) => {
    for (let c = 0; c < line.length; c++) {
      if (line[c] === "O") cells.push([top + r, left + c]);
    }
  });
  return liveCellsSeed(width, height, cells);
}

/** Seed rule for a named preset on a grid of the given size. */
export function createSeed(preset: SeedPreset, width: number, height: number): SeedRule {
  switch (preset) {
    case "demo":
      return demoSeed;
    case "empty":
      return emptySeed;
    default:
      return patternSeed(width, height, PATTERNS[preset]);
  }
}
