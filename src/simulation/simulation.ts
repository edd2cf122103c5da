import { Grid } from "./grid";
import { SeedPreset, createSeed } from "./seed-presets";
import { GRID_WIDTH, GRID_HEIGHT } from "../constants";

/**
 * Single owner of the grid. The animation loop steps it and the input layer
 * toggles through it; resetting swaps in a freshly seeded grid of the same size.
 */
export class Simulation {
  private _grid: Grid;

  constructor(readonly width = GRID_WIDTH, readonly height = GRID_HEIGHT, preset: SeedPreset = "demo") {
    this._grid = new Grid(width, height, createSeed(preset, width, height));
  }

  get grid(): Grid {
    return this._grid;
  }

  step(): void {
    this._grid.tick();
  }

  toggle(row: number, col: number): void {
    this._grid.toggleCell(row, col);
  }

  reset(preset: SeedPreset): void {
    this._grid = new Grid(this.width, this.height, createSeed(preset, this.width, this.height));
  }
}
