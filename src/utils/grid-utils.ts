import { CELL_SIZE } from "../constants";

export interface CellCoordinates {
  row: number;
  col: number;
}

/** Pixel size of a canvas drawing `cols` x `rows` cells with 1px grid lines around each. */
export function canvasSize(cols: number, rows: number, cellSize = CELL_SIZE): { width: number; height: number } {
  return {
    width: (cellSize + 1) * cols + 1,
    height: (cellSize + 1) * rows + 1,
  };
}

/** Top-left pixel of the fill area of a cell, just inside its grid lines. */
export function cellOrigin(row: number, col: number, cellSize = CELL_SIZE): { x: number; y: number } {
  return {
    x: col * (cellSize + 1) + 1,
    y: row * (cellSize + 1) + 1,
  };
}

/**
 * Maps a pixel offset inside the canvas to the cell under it, or null when
 * the point lies outside the grid. Points on a grid line belong to the cell
 * below or to the right of that line.
 */
export function cellAtPoint(
  x: number, y: number, cols: number, rows: number, cellSize = CELL_SIZE,
): CellCoordinates | null {
  if (x < 0 || y < 0) return null;
  const col = Math.floor(x / (cellSize + 1));
  const row = Math.floor(y / (cellSize + 1));
  if (row >= rows || col >= cols) return null;
  return { row, col };
}
