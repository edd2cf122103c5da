import { Grid } from "./grid";
import { Cell } from "../types/grid-types";
import { createSeed, demoSeed, emptySeed, liveCellsSeed, patternSeed } from "./seed-presets";

function aliveIndices(width: number, height: number, seed: (i: number) => Cell): number[] {
  const out: number[] = [];
  for (let i = 0; i < width * height; i++) {
    if (seed(i) === Cell.Alive) out.push(i);
  }
  return out;
}

describe("demoSeed", () => {
  it("is alive on multiples of 2 or 7", () => {
    expect(aliveIndices(16, 1, demoSeed)).toEqual([0, 2, 4, 6, 7, 8, 10, 12, 14]);
  });
});

describe("emptySeed", () => {
  it("has no live cells", () => {
    expect(aliveIndices(8, 8, emptySeed)).toEqual([]);
  });
});

describe("liveCellsSeed", () => {
  it("marks exactly the listed cells", () => {
    const seed = liveCellsSeed(5, 4, [[0, 0], [1, 3], [3, 4]]);
    expect(aliveIndices(5, 4, seed)).toEqual([0, 8, 19]);
  });

  it("wraps coordinates outside the grid", () => {
    const seed = liveCellsSeed(5, 5, [[-1, -1], [5, 6]]);
    // (-1, -1) -> (4, 4) = 24; (5, 6) -> (0, 1) = 1
    expect(aliveIndices(5, 5, seed)).toEqual([1, 24]);
  });
});

describe("patternSeed", () => {
  it("centers the pattern by default", () => {
    const seed = patternSeed(5, 5, ["OOO"]);
    // top = floor((5 - 1) / 2) = 2, left = floor((5 - 3) / 2) = 1
    expect(aliveIndices(5, 5, seed)).toEqual([11, 12, 13]);
  });

  it("places the pattern at an explicit origin", () => {
    const seed = patternSeed(6, 6, [".O", "O."], { row: 1, col: 2 });
    // (1, 3) = 9, (2, 2) = 14
    expect(aliveIndices(6, 6, seed)).toEqual([9, 14]);
  });

  it("wraps a pattern that crosses the edge", () => {
    const seed = patternSeed(4, 4, ["OO"], { row: 3, col: 3 });
    // (3, 3) = 15, (3, 0) = 12
    expect(aliveIndices(4, 4, seed)).toEqual([12, 15]);
  });
});

describe("createSeed", () => {
  it("demo and empty map to the plain rules", () => {
    expect(createSeed("demo", 10, 10)).toBe(demoSeed);
    expect(createSeed("empty", 10, 10)).toBe(emptySeed);
  });

  it("centers a glider", () => {
    const grid = new Grid(8, 8, createSeed("glider", 8, 8));
    expect(grid.renderText().split("\n").slice(2, 5)).toEqual([
      "◻◻◻◼◻◻◻◻",
      "◻◻◻◻◼◻◻◻",
      "◻◻◼◼◼◻◻◻",
    ]);
    expect(grid.population()).toBe(5);
  });

  it("places the glider gun's 36 cells", () => {
    const grid = new Grid(64, 64, createSeed("glider-gun", 64, 64));
    expect(grid.population()).toBe(36);
  });

  it("r-pentomino has 5 cells", () => {
    const grid = new Grid(16, 16, createSeed("r-pentomino", 16, 16));
    expect(grid.population()).toBe(5);
  });

  it("blinker oscillates", () => {
    const grid = new Grid(7, 7, createSeed("blinker", 7, 7));
    const start = grid.renderText();
    grid.tick();
    expect(grid.renderText()).not.toBe(start);
    grid.tick();
    expect(grid.renderText()).toBe(start);
  });
});
