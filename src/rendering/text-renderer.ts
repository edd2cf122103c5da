import type { IGrid } from "../types/grid-types";
import type { Renderer, RendererOptions, RendererMetrics } from "../types/renderer-types";
import { SceneTimer } from "./scene-timer";

/** Headless-friendly view: the grid's text snapshot in a <pre>. */
export function createTextRenderer(): Renderer {
  const pre = document.createElement("pre");
  pre.className = "life-text";
  const timer = new SceneTimer();

  function update(grid: IGrid, opts: RendererOptions): RendererMetrics {
    timer.time(() => {
      pre.textContent = grid.renderText();
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
    element: pre,
    update,
    destroy() {
      pre.remove();
    },
  };
}
