/** EMA-smoothed scene-update timing shared by the renderers. */
export class SceneTimer {
  sceneUpdateTimeMs = 0;
  private readonly emaAlpha = 0.05;

  time(draw: () => void): void {
    const t0 = performance.now();
    draw();
    const rawMs = performance.now() - t0;
    this.sceneUpdateTimeMs = this.emaAlpha * rawMs + (1 - this.emaAlpha) * this.sceneUpdateTimeMs;
  }
}
