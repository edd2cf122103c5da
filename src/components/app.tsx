import React, { useState, useRef } from "react";
import { LifeCanvas } from "./life-canvas";
import { Simulation } from "../simulation/simulation";
import { SeedPreset } from "../simulation/seed-presets";
import { ALIVE_COLOR, DEAD_COLOR, DEFAULT_GENERATIONS_PER_SECOND, SPEED_OPTIONS } from "../constants";
import { hexColor } from "../utils/color-utils";
import type { RendererMetrics, ViewMode } from "../types/renderer-types";

import "./app.css";

const PRESET_LABELS: Record<SeedPreset, string> = {
  "demo": "Demo",
  "empty": "Empty",
  "glider": "Glider",
  "blinker": "Blinker",
  "r-pentomino": "R-pentomino",
  "glider-gun": "Glider Gun",
};

function isSeedPreset(value: string): value is SeedPreset {
  return value in PRESET_LABELS;
}

function isViewMode(value: string): value is ViewMode {
  return value === "canvas" || value === "text";
}

export const App = () => {
  const simulationRef = useRef(new Simulation());
  const simulation = simulationRef.current;

  const [paused, setPaused] = useState(true);
  const [targetStepsPerSecond, setTargetStepsPerSecond] = useState(DEFAULT_GENERATIONS_PER_SECOND);
  const [preset, setPreset] = useState<SeedPreset>("demo");
  const [viewMode, setViewMode] = useState<ViewMode>("canvas");
  const [revision, setRevision] = useState(0);
  const [metrics, setMetrics] = useState<RendererMetrics | null>(null);

  const bump = () => setRevision(r => r + 1);

  const changePreset = (value: string) => {
    if (!isSeedPreset(value)) return;
    setPreset(value);
    simulation.reset(value);
    bump();
  };

  // Build performance metrics string
  const perfParts: string[] = [];
  if (metrics) {
    const fps = metrics.fps;
    const frameMs = fps > 0 ? 1000 / fps : 0;
    const stepPct = frameMs > 0 ? (metrics.stepTimeMs / frameMs * 100).toFixed(0) : "0";
    const drawPct = frameMs > 0 ? (metrics.sceneUpdateTimeMs / frameMs * 100).toFixed(0) : "0";
    perfParts.push(`${Math.round(fps)} fps`);
    perfParts.push(`${Math.round(metrics.actualStepsPerSecond)} gen/s`);
    perfParts.push(`step ${metrics.stepTimeMs.toFixed(1)}ms (${stepPct}%)`);
    perfParts.push(`draw ${metrics.sceneUpdateTimeMs.toFixed(1)}ms (${drawPct}%)`);
    perfParts.push(`population ${metrics.population}`);
  }

  return (
    <div className="app">
      <div className="controls">
        <button onClick={() => setPaused(p => !p)}>{paused ? "Play" : "Pause"}</button>
        <button
          onClick={() => {
            simulation.step();
            bump();
          }}
          disabled={!paused}
        >
          Step
        </button>
        <label>
          Speed: {targetStepsPerSecond} gen/s
          <select value={targetStepsPerSecond} onChange={e => setTargetStepsPerSecond(Number(e.target.value))}>
            {SPEED_OPTIONS.map(s => <option key={s} value={s}>{s} gen/s</option>)}
          </select>
        </label>
        <label>
          Pattern:
          <select value={preset} onChange={e => changePreset(e.target.value)}>
            {Object.entries(PRESET_LABELS).map(([value, label]) =>
              <option key={value} value={value}>{label}</option>)}
          </select>
        </label>
        <label>
          View:
          <select value={viewMode} onChange={e => { if (isViewMode(e.target.value)) setViewMode(e.target.value); }}>
            <option value="canvas">Canvas</option>
            <option value="text">Text</option>
          </select>
        </label>
        <span className="generation">{`Generation: ${simulation.grid.generation}`}</span>
      </div>
      <div className="canvas-container">
        <LifeCanvas
          simulation={simulation}
          targetStepsPerSecond={targetStepsPerSecond}
          paused={paused}
          viewMode={viewMode}
          revision={revision}
          onMetrics={setMetrics}
        />
        <div className="legend-overlay">
          <div>
            <span className="swatch" style={{ background: hexColor(ALIVE_COLOR) }} /> alive
            <span className="swatch" style={{ background: hexColor(DEAD_COLOR) }} /> dead
          </div>
          {perfParts.length > 0 && <div>{perfParts.join(" | ")}</div>}
        </div>
      </div>
    </div>
  );
};
