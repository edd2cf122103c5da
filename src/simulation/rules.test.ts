import { nextCellState } from "./rules";
import { Cell } from "../types/grid-types";

describe("nextCellState", () => {
  it("kills live cells with fewer than 2 neighbors", () => {
    expect(nextCellState(Cell.Alive, 0)).toBe(Cell.Dead);
    expect(nextCellState(Cell.Alive, 1)).toBe(Cell.Dead);
  });

  it("keeps live cells with 2 or 3 neighbors", () => {
    expect(nextCellState(Cell.Alive, 2)).toBe(Cell.Alive);
    expect(nextCellState(Cell.Alive, 3)).toBe(Cell.Alive);
  });

  it("kills live cells with more than 3 neighbors", () => {
    for (let n = 4; n <= 8; n++) {
      expect(nextCellState(Cell.Alive, n)).toBe(Cell.Dead);
    }
  });

  it("births dead cells with exactly 3 neighbors", () => {
    expect(nextCellState(Cell.Dead, 3)).toBe(Cell.Alive);
  });

  it("leaves other dead cells dead", () => {
    for (const n of [0, 1, 2, 4, 5, 6, 7, 8]) {
      expect(nextCellState(Cell.Dead, n)).toBe(Cell.Dead);
    }
  });
});
