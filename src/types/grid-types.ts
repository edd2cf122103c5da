/** State of a single cell. Stored as one byte per cell in the grid buffer. */
export const Cell = {
  Dead: 0,
  Alive: 1,
} as const;

export type Cell = (typeof Cell)[keyof typeof Cell];

/** Narrows a raw buffer byte to a cell state. Any nonzero byte reads as alive. */
export function toCell(value: number): Cell {
  return value === 0 ? Cell.Dead : Cell.Alive;
}

/**
 * Read-only view of the cell buffer, row-major.
 * Only valid until the next mutation of the grid it came from.
 */
export interface ICellView extends Iterable<Cell> {
  readonly length: number;
  at(index: number): Cell;
}

/**
 * Read-only interface for the simulation grid.
 * Used by rendering and utility code that reads grid state without modifying it.
 */
export interface IGrid {
  readonly width: number;
  readonly height: number;
  readonly generation: number;
  cellAt(row: number, col: number): Cell;
  rawView(): ICellView;
  renderText(): string;
  population(): number;
}
