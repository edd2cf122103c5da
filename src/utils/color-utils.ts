import { Cell } from "../types/grid-types";
import { ALIVE_COLOR, DEAD_COLOR } from "../constants";

/** Fill color (0xRRGGBB) for a cell state. */
export function cellColor(cell: Cell): number {
  return cell === Cell.Alive ? ALIVE_COLOR : DEAD_COLOR;
}

/** Convert a 0xRRGGBB number to a CSS hex color string. */
export function hexColor(c: number): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}
