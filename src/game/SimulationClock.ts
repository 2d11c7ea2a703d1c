import { SIM } from "../config/game.constants.js";
import type { ClockView } from "./context.js";

export interface ClockConfig {
  tickRate: number;
  maxStepsPerAdvance: number;
}

/**
 * Fixed-timestep accumulator. Wall-clock time goes in, whole ticks come out,
 * so simulation results do not depend on how often advance() is called.
 */
export class SimulationClock implements ClockView {
  readonly dt: number;
  private readonly stepMs: number;
  private readonly maxSteps: number;
  private accumulatorMs = 0;
  private tickCount = 0;
  private paused = false;

  constructor(overrides: Partial<ClockConfig> = {}) {
    const tickRate = overrides.tickRate ?? SIM.TICK_RATE;
    this.dt = 1 / tickRate;
    this.stepMs = 1000 / tickRate;
    this.maxSteps = overrides.maxStepsPerAdvance ?? SIM.MAX_STEPS_PER_ADVANCE;
  }

  get tick(): number {
    return this.tickCount;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  /**
   * Runs `step` once per whole tick contained in the accumulated time. When a
   * frame arrives so late that more than maxStepsPerAdvance ticks are due, the
   * whole ticks beyond that are dropped and the sub-tick remainder is kept.
   * Returns the number of ticks run.
   */
  advance(elapsedMs: number, step: () => void): number {
    if (this.paused || !(elapsedMs > 0)) return 0;
    this.accumulatorMs += elapsedMs;

    let steps = 0;
    while (this.accumulatorMs >= this.stepMs && steps < this.maxSteps) {
      this.accumulatorMs -= this.stepMs;
      step();
      steps++;
    }
    if (steps === this.maxSteps && this.accumulatorMs >= this.stepMs) {
      this.accumulatorMs %= this.stepMs;
    }
    return steps;
  }

  /** Opens the next tick; the simulation calls this at the top of every step. */
  markTick(): void {
    this.tickCount++;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }
}
