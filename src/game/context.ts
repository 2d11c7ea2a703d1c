import type { EntityStore } from "./EntityStore.js";
import type { ObstacleIndex } from "./ObstacleIndex.js";
import type { RandomSource } from "./Rng.js";

export interface ClockView {
  readonly tick: number;
  /** Fixed tick duration in seconds. */
  readonly dt: number;
}

export interface ScoreView {
  /** Elapsed survival time in seconds. */
  readonly elapsed: number;
  readonly score: number;
}

/** Everything a component may read or mutate during one tick; passed explicitly, never global. */
export interface SimulationContext {
  readonly entities: EntityStore;
  readonly obstacles: ObstacleIndex;
  readonly rng: RandomSource;
  readonly clock: ClockView;
  readonly score: ScoreView;
}
