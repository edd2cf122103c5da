import { Cell, ICellView, toCell } from "../types/grid-types";
import { IndexOutOfBoundsError, StaleViewError } from "./errors";

/**
 * Bounds-checked, read-only window onto a grid's cell buffer.
 *
 * The view captures the grid's mutation version when it is taken. Once the
 * grid ticks or toggles a cell, `isCurrent()` returns false and every read
 * throws `StaleViewError`.
 */
export class CellView implements ICellView {
  private readonly cells: Uint8Array;
  private readonly version: number;
  private readonly currentVersion: () => number;

  constructor(cells: Uint8Array, version: number, currentVersion: () => number) {
    this.cells = cells;
    this.version = version;
    this.currentVersion = currentVersion;
  }

  get length(): number {
    return this.cells.length;
  }

  isCurrent(): boolean {
    return this.currentVersion() === this.version;
  }

  at(index: number): Cell {
    this.assertCurrent();
    if (!Number.isInteger(index) || index < 0 || index >= this.cells.length) {
      throw IndexOutOfBoundsError.forIndex(index, this.cells.length);
    }
    return toCell(this.cells[index]);
  }

  *[Symbol.iterator](): Iterator<Cell> {
    for (let i = 0; i < this.cells.length; i++) {
      this.assertCurrent();
      yield toCell(this.cells[i]);
    }
  }

  private assertCurrent(): void {
    if (!this.isCurrent()) throw new StaleViewError();
  }
}
