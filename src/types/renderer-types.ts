import type { IGrid } from "./grid-types";

export type ViewMode = "canvas" | "text";

export interface RendererOptions {
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface RendererMetrics {
  population: number;
  generation: number;
  fps: number;
  sceneUpdateTimeMs: number;
  stepTimeMs: number;
  actualStepsPerSecond: number;
}

export interface Renderer {
  update(grid: IGrid, opts: RendererOptions): RendererMetrics;
  destroy(): void;
  /** Element the renderer draws into; the caller attaches it to the page. */
  readonly element: HTMLElement;
}
