import { Cell } from "../types/grid-types";

/**
 * B3/S23: a live cell survives with 2 or 3 live neighbors, a dead cell is
 * born with exactly 3. Everything else is dead in the next generation.
 */
export function nextCellState(cell: Cell, liveNeighbors: number): Cell {
  if (cell === Cell.Alive) {
    // Underpopulation below 2, overpopulation above 3
    return liveNeighbors === 2 || liveNeighbors === 3 ? Cell.Alive : Cell.Dead;
  }
  // Reproduction
  return liveNeighbors === 3 ? Cell.Alive : Cell.Dead;
}
