/**
 * Turns wall-clock frame deltas into whole generations at a target rate,
 * independent of the display's frame rate. Tracks timing metrics.
 */
export class SimulationStepper {
  targetStepsPerSecond = 10;
  paused = false;

  /**
   * Upper bound on steps run by a single advance() call. Time owed beyond it
   * is dropped, so a long gap between frames (a background tab) does not
   * turn into a burst of generations.
   */
  maxStepsPerFrame = 8;

  /** EMA-smoothed actual steps per second. */
  actualStepsPerSecond = 0;

  /** EMA-smoothed time spent in step() calls per frame, in ms. */
  stepTimeMs = 0;

  /** Steps executed by the most recent advance() call. */
  lastStepsThisFrame = 0;

  private owed = 0;
  private readonly stepFn: () => void;

  /** ~0.05 at 60fps gives a ~330ms time constant. */
  private readonly emaAlpha = 0.05;

  constructor(stepFn: () => void) {
    this.stepFn = stepFn;
  }

  /** Forget fractional progress, e.g. after the grid was replaced. */
  reset(): void {
    this.owed = 0;
    this.lastStepsThisFrame = 0;
  }

  /**
   * Called once per frame with the milliseconds since the previous frame.
   * Runs as many steps as the elapsed time buys at the target rate.
   */
  advance(deltaMs: number): void {
    this.lastStepsThisFrame = 0;
    if (this.paused) {
      this.stepTimeMs = 0;
      // actualStepsPerSecond stays frozen at its last value
      return;
    }

    const deltaSeconds = deltaMs / 1000;
    if (deltaSeconds <= 0) return;

    this.owed += this.targetStepsPerSecond * deltaSeconds;
    let steps = Math.floor(this.owed);
    if (steps > this.maxStepsPerFrame) {
      steps = this.maxStepsPerFrame;
      this.owed = 0;
    } else {
      this.owed -= steps;
    }
    this.lastStepsThisFrame = steps;

    const t0 = performance.now();
    for (let i = 0; i < steps; i++) {
      this.stepFn();
    }
    this.stepTimeMs = this.ema(this.stepTimeMs, performance.now() - t0);
    this.actualStepsPerSecond = this.ema(this.actualStepsPerSecond, steps / deltaSeconds);
  }

  private ema(previous: number, sample: number): number {
    return this.emaAlpha * sample + (1 - this.emaAlpha) * previous;
  }
}
