import { cellColor, hexColor } from "./color-utils";
import { Cell } from "../types/grid-types";
import { ALIVE_COLOR, DEAD_COLOR } from "../constants";

describe("cellColor", () => {
  it("uses the alive and dead fill colors", () => {
    expect(cellColor(Cell.Alive)).toBe(ALIVE_COLOR);
    expect(cellColor(Cell.Dead)).toBe(DEAD_COLOR);
  });
});

describe("hexColor", () => {
  it("zero-pads to six digits", () => {
    expect(hexColor(0x000000)).toBe("#000000");
    expect(hexColor(0x00ff0a)).toBe("#00ff0a");
    expect(hexColor(0xcccccc)).toBe("#cccccc");
  });
});
