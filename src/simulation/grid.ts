import { Cell, IGrid, toCell } from "../types/grid-types";
import { ALIVE_GLYPH, DEAD_GLYPH } from "../constants";
import { CellView } from "./cell-view";
import { IndexOutOfBoundsError, InvalidDimensionsError } from "./errors";
import { nextCellState } from "./rules";
import { SeedRule, demoSeed } from "./seed-presets";

/**
 * Game of Life grid on a torus: rows and columns both wrap.
 *
 * cells[r * width + c] holds the state of row r, column c (0 = dead, 1 = alive).
 * tick() writes the next generation into a second buffer and swaps the two,
 * so every cell is computed from the previous generation only.
 *
 * Coordinates outside the grid throw IndexOutOfBoundsError; they never wrap.
 * Wrapping only happens inside neighbor counting.
 */
export class Grid implements IGrid {
  private cells: Uint8Array;
  private next: Uint8Array;
  private readonly rowOffsets: readonly number[];
  private readonly colOffsets: readonly number[];
  private _generation = 0;
  /** Bumped on every mutation; invalidates outstanding cell views. */
  private version = 0;

  constructor(readonly width: number, readonly height: number, seed: SeedRule = demoSeed) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InvalidDimensionsError(width, height);
    }
    const size = width * height;
    this.cells = new Uint8Array(size);
    this.next = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      this.cells[i] = seed(i);
    }
    // Adding height - 1 modulo height steps one row back without going negative.
    this.rowOffsets = [height - 1, 0, 1];
    this.colOffsets = [width - 1, 0, 1];
  }

  get generation(): number {
    return this._generation;
  }

  idx(r: number, c: number): number {
    return r * this.width + c;
  }

  cellAt(r: number, c: number): Cell {
    this.assertInBounds(r, c);
    return toCell(this.cells[this.idx(r, c)]);
  }

  toggleCell(r: number, c: number): void {
    this.assertInBounds(r, c);
    const i = this.idx(r, c);
    this.cells[i] = this.cells[i] === Cell.Alive ? Cell.Dead : Cell.Alive;
    this.version++;
  }

  /**
   * Number of live cells among the 8 wrapped neighbors of (r, c).
   *
   * On grids 1 or 2 cells wide or tall the wrapped coordinates repeat, so the
   * same neighbor (or the cell itself) may be counted more than once. A lone
   * live cell on a 1x1 grid counts 5.
   */
  liveNeighborCount(r: number, c: number): number {
    this.assertInBounds(r, c);
    return this.countNeighbors(r, c);
  }

  /** Advance exactly one generation. */
  tick(): void {
    const { width, height, cells, next } = this;
    for (let r = 0; r < height; r++) {
      for (let c = 0; c < width; c++) {
        const i = r * width + c;
        next[i] = nextCellState(toCell(cells[i]), this.countNeighbors(r, c));
      }
    }
    this.cells = next;
    this.next = cells;
    this._generation++;
    this.version++;
  }

  rawView(): CellView {
    return new CellView(this.cells, this.version, () => this.version);
  }

  population(): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      count += this.cells[i];
    }
    return count;
  }

  /** One line per row, one glyph per cell, each line newline-terminated. */
  renderText(): string {
    let out = "";
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) {
        out += this.cells[this.idx(r, c)] === Cell.Alive ? ALIVE_GLYPH : DEAD_GLYPH;
      }
      out += "\n";
    }
    return out;
  }

  private countNeighbors(r: number, c: number): number {
    const { width, height, cells, rowOffsets, colOffsets } = this;
    let count = 0;
    for (const dr of rowOffsets) {
      for (const dc of colOffsets) {
        if (dr === 0 && dc === 0) continue;
        const nr = (r + dr) % height;
        const nc = (c + dc) % width;
        count += cells[nr * width + nc];
      }
    }
    return count;
  }

  private assertInBounds(r: number, c: number): void {
    if (!Number.isInteger(r) || !Number.isInteger(c) ||
        r < 0 || r >= this.height || c < 0 || c >= this.width) {
      throw IndexOutOfBoundsError.forCoordinates(r, c, this.width, this.height);
    }
  }
}
