import { Application, Container, Graphics, GraphicsContext } from "pixi.js";
import { CELL_SIZE, DEAD_COLOR, GRID_COLOR } from "../constants";
import type { IGrid } from "../types/grid-types";
import type { Renderer, RendererOptions, RendererMetrics } from "../types/renderer-types";
import { canvasSize, cellOrigin } from "../utils/grid-utils";
import { cellColor } from "../utils/color-utils";
import { SceneTimer } from "./scene-timer";

/**
 * PixiJS renderer: 1px grid lines and one tinted square per cell.
 *
 * Cell squares share a single 1x1 GraphicsContext and differ only by
 * position, scale and tint. The grid lines and cell sprites are rebuilt
 * only when the grid's dimensions change.
 */
export async function createGridRenderer(
  canvas: HTMLCanvasElement, cols: number, rows: number, cellSize = CELL_SIZE,
): Promise<Renderer> {
  const size = canvasSize(cols, rows, cellSize);
  const app = new Application();
  await app.init({ canvas, width: size.width, height: size.height, background: DEAD_COLOR });
  app.ticker.stop();

  const lines = new Graphics();
  const cellContainer = new Container();
  app.stage.addChild(lines, cellContainer);

  const cellContext = new GraphicsContext();
  cellContext.rect(0, 0, 1, 1).fill({ color: 0xffffff });

  let cells: Graphics[] = [];
  let layoutCols = 0;
  let layoutRows = 0;
  const timer = new SceneTimer();

  function layout(nextCols: number, nextRows: number): void {
    const { width, height } = canvasSize(nextCols, nextRows, cellSize);
    app.renderer.resize(width, height);

    lines.clear();
    for (let c = 0; c <= nextCols; c++) {
      const x = c * (cellSize + 1) + 0.5;
      lines.moveTo(x, 0).lineTo(x, height);
    }
    for (let r = 0; r <= nextRows; r++) {
      const y = r * (cellSize + 1) + 0.5;
      lines.moveTo(0, y).lineTo(width, y);
    }
    lines.stroke({ width: 1, color: GRID_COLOR });

    for (const g of cells) g.destroy();
    cellContainer.removeChildren();
    cells = [];
    for (let r = 0; r < nextRows; r++) {
      for (let c = 0; c < nextCols; c++) {
        const g = new Graphics(cellContext);
        const { x, y } = cellOrigin(r, c, cellSize);
        g.position.set(x, y);
        g.scale.set(cellSize);
        cellContainer.addChild(g);
        cells.push(g);
      }
    }
    layoutCols = nextCols;
    layoutRows = nextRows;
  }

  layout(cols, rows);

  function update(grid: IGrid, opts: RendererOptions): RendererMetrics {
    timer.time(() => {
      if (grid.width !== layoutCols || grid.height !== layoutRows) {
        layout(grid.width, grid.height);
      }
      let i = 0;
      for (const cell of grid.rawView()) {
        cells[i++].tint = cellColor(cell);
      }
      app.render();
    });

    return {
      population: grid.population(),
      generation: grid.generation,
      fps: 0,
      sceneUpdateTimeMs: timer.sceneUpdateTimeMs,
      stepTimeMs: opts.stepTimeMs,
      actualStepsPerSecond: opts.actualStepsPerSecond,
    };
  }

  return {
    element: canvas,
    update,
    destroy() {
      cellContext.destroy();
      app.destroy();
    },
  };
}
