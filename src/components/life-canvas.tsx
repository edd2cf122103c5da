import React, { useRef, useEffect, useCallback } from "react";
import { createGridRenderer } from "../rendering/grid-renderer";
import { createTextRenderer } from "../rendering/text-renderer";
import type { Renderer, RendererMetrics, ViewMode } from "../types/renderer-types";
import { Simulation } from "../simulation/simulation";
import { SimulationStepper } from "../simulation/simulation-stepper";
import { TARGET_FPS } from "../constants";
import { cellAtPoint } from "../utils/grid-utils";

interface Props {
  simulation: Simulation;
  targetStepsPerSecond: number;
  paused: boolean;
  viewMode: ViewMode;
  /** Bumped by the parent whenever it changed the simulation (step, reset). */
  revision: number;
  onMetrics?: (metrics: RendererMetrics) => void;
}

export const LifeCanvas: React.FC<Props> = ({
  simulation, targetStepsPerSecond, paused, viewMode, revision, onMetrics,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const stepperRef = useRef<SimulationStepper | null>(null);
  const simRef = useRef(simulation);
  simRef.current = simulation;
  const targetStepsPerSecondRef = useRef(targetStepsPerSecond);
  targetStepsPerSecondRef.current = targetStepsPerSecond;
  const pausedRef = useRef(paused);
  pausedRef.current = paused;
  const onMetricsRef = useRef(onMetrics);
  onMetricsRef.current = onMetrics;
  const viewModeRef = useRef(viewMode);
  viewModeRef.current = viewMode;

  // Increments on every React render (i.e., whenever any prop changes).
  // The rAF loop compares this against lastRenderedVersion to skip redundant
  // renders when paused. Clicks bump it directly.
  const renderVersionRef = useRef(0);
  renderVersionRef.current += 1;

  // Create/recreate the renderer when viewMode changes; destroy on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    const stepper = new SimulationStepper(() => simRef.current.step());
    stepperRef.current = stepper;

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/TARGET_FPS.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;
      let lastRenderedVersion = -1;

      function frame(timestamp: number): void {
        if (destroyed) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(frame);
          return;
        }
        lastFrameTime = timestamp;
        const fps = elapsed > 0 ? 1000 / elapsed : 0;

        stepper.paused = pausedRef.current;
        stepper.targetStepsPerSecond = targetStepsPerSecondRef.current;
        stepper.advance(elapsed);

        // Nothing to draw while paused unless something changed.
        const changed = renderVersionRef.current !== lastRenderedVersion;
        if (pausedRef.current && !changed) {
          rafId = requestAnimationFrame(frame);
          return;
        }

        const metrics = renderer.update(simRef.current.grid, {
          stepTimeMs: stepper.stepTimeMs,
          actualStepsPerSecond: stepper.actualStepsPerSecond,
        });
        lastRenderedVersion = renderVersionRef.current;

        metrics.fps = fps;
        onMetricsRef.current?.(metrics);

        rafId = requestAnimationFrame(frame);
      }

      rafId = requestAnimationFrame(frame);
    }

    (async () => {
      let renderer: Renderer;
      const { grid } = simRef.current;

      if (viewMode === "text") {
        renderer = createTextRenderer();
        container.appendChild(renderer.element);
      } else {
        const canvas = document.createElement("canvas");
        container.appendChild(canvas);
        renderer = await createGridRenderer(canvas, grid.width, grid.height);
      }

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      startRafLoop(renderer);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);
      rendererRef.current?.destroy();
      rendererRef.current = null;
      stepperRef.current = null;

      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, [viewMode]);

  // A reset swaps in a new grid; drop time owed to the old one.
  useEffect(() => {
    stepperRef.current?.reset();
  }, [simulation, revision]);

  const handleClick = useCallback((e: React.MouseEvent<HTMLDivElement>) => {
    const renderer = rendererRef.current;
    if (!renderer || viewModeRef.current !== "canvas") return;
    const rect = renderer.element.getBoundingClientRect();
    const { grid } = simRef.current;
    const hit = cellAtPoint(e.clientX - rect.left, e.clientY - rect.top, grid.width, grid.height);
    if (!hit) return;
    simRef.current.toggle(hit.row, hit.col);
    renderVersionRef.current += 1;
  }, []);

  return <div ref={containerRef} className="life-canvas" onClick={handleClick} />;
};
