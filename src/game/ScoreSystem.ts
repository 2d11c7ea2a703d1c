import { SIM } from "../config/game.constants.js";
import { ZOMBIE_CONFIGS, type ZombieType } from "../types/zombie.js";
import type { ScoreView } from "./context.js";

export interface ScoreSnapshot {
  elapsed: number;
  score: number;
  kills: number;
  killsByType: Record<ZombieType, number>;
}

/** Survival time and score. Advances on its own; the rest of the core only reads it. */
export class ScoreSystem implements ScoreView {
  private elapsedSeconds = 0;
  private points = 0;
  private survivalCarry = 0;
  private readonly killsByType: Record<ZombieType, number> = { weak: 0, fast: 0, tough: 0 };
  private readonly survivalPointsPerSecond: number;

  constructor(survivalPointsPerSecond: number = SIM.SCORE.SURVIVAL_POINTS_PER_SECOND) {
    this.survivalPointsPerSecond = survivalPointsPerSecond;
  }

  get elapsed(): number {
    return this.elapsedSeconds;
  }

  get score(): number {
    return this.points;
  }

  get kills(): number {
    return this.killsByType.weak + this.killsByType.fast + this.killsByType.tough;
  }

  advance(dt: number): void {
    this.elapsedSeconds += dt;
    this.survivalCarry += dt * this.survivalPointsPerSecond;
    const whole = Math.floor(this.survivalCarry);
    if (whole > 0) {
      this.points += whole;
      this.survivalCarry -= whole;
    }
  }

  addKill(type: ZombieType): void {
    this.killsByType[type]++;
    this.points += ZOMBIE_CONFIGS[type].score;
  }

  snapshot(): ScoreSnapshot {
    return {
      elapsed: this.elapsedSeconds,
      score: this.points,
      kills: this.kills,
      killsByType: { ...this.killsByType },
    };
  }
}
