import { z } from "zod";
import { SIM } from "../config/game.constants.js";
import type { Vec2 } from "../types/entity.js";
import { ZOMBIE_CONFIGS, ZOMBIE_TYPES, type ZombieType, type ZombieWeights } from "../types/zombie.js";
import type { SimulationContext } from "./context.js";
import { SimulationInputError } from "./errors.js";
import { clamp, distance } from "./geometry.js";
import type { ObstacleIndex } from "./ObstacleIndex.js";
import { weightedPick, type RandomSource } from "./Rng.js";

export interface CompositionBreakpoint {
  /** Survival time in seconds from which these weights apply. */
  at: number;
  weights: ZombieWeights;
}

export interface DirectorConfig {
  baseTarget: number;
  targetRate: number;
  scoreRate: number;
  maxCap: number;
  firstSpawnDelay: number;
  initialSpawnInterval: number;
  minSpawnInterval: number;
  spawnIntervalDecay: number;
  batchSize: number;
  spawnRadiusMin: number;
  spawnRadiusMax: number;
  minDistanceFromPlayer: number;
  minZombieSpacing: number;
  maxSpawnAttempts: number;
  intensityFullAt: number;
  composition: readonly CompositionBreakpoint[];
}

export interface SpawnDirective {
  weights: ZombieWeights;
  targetCount: number;
  spawnInterval: number;
  spawnTimerRemaining: number;
}

export interface SpawnRequest {
  type: ZombieType;
  x: number;
  y: number;
}

export interface DirectorUpdate {
  directive: SpawnDirective;
  requests: SpawnRequest[];
}

const nonNegative = z.number().finite().nonnegative();
const positive = z.number().finite().positive();

const WeightsSchema = z
  .object({ weak: nonNegative, fast: nonNegative, tough: nonNegative })
  .refine((w) => w.weak + w.fast + w.tough > 0, { message: "weights must not all be zero" });

const DirectorConfigSchema = z
  .object({
    baseTarget: nonNegative,
    targetRate: nonNegative,
    scoreRate: nonNegative,
    maxCap: z.number().int().nonnegative(),
    firstSpawnDelay: nonNegative,
    initialSpawnInterval: positive,
    minSpawnInterval: positive,
    spawnIntervalDecay: positive,
    batchSize: z.number().int().positive(),
    spawnRadiusMin: nonNegative,
    spawnRadiusMax: nonNegative,
    minDistanceFromPlayer: nonNegative,
    minZombieSpacing: nonNegative,
    maxSpawnAttempts: z.number().int().positive(),
    intensityFullAt: positive,
    composition: z.array(z.object({ at: nonNegative, weights: WeightsSchema })).min(1),
  })
  .refine((c) => c.minSpawnInterval <= c.initialSpawnInterval, {
    message: "minSpawnInterval must not exceed initialSpawnInterval",
  })
  .refine((c) => c.spawnRadiusMin <= c.spawnRadiusMax, {
    message: "spawnRadiusMin must not exceed spawnRadiusMax",
  })
  .refine((c) => c.composition.every((b, i) => i === 0 || c.composition[i - 1].at < b.at), {
    message: "composition breakpoints must be in increasing order",
  });

function normalizeWeights(weights: ZombieWeights): ZombieWeights {
  const total = weights.weak + weights.fast + weights.tough;
  return { weak: weights.weak / total, fast: weights.fast / total, tough: weights.tough / total };
}

/**
 * The director: decides when zombies enter the map and which kinds, from
 * elapsed survival time T and score S alone. It never creates entities
 * itself; it returns spawn requests for the entity factory.
 */
export class ZombieManager {
  readonly config: DirectorConfig;
  private readonly obstacles: ObstacleIndex;
  private spawnTimer: number;

  constructor(obstacles: ObstacleIndex, overrides: Partial<DirectorConfig> = {}) {
    this.config = {
      baseTarget: SIM.DIRECTOR.BASE_TARGET,
      targetRate: SIM.DIRECTOR.TARGET_RATE,
      scoreRate: SIM.DIRECTOR.SCORE_RATE,
      maxCap: SIM.DIRECTOR.MAX_CAP,
      firstSpawnDelay: SIM.DIRECTOR.FIRST_SPAWN_DELAY,
      initialSpawnInterval: SIM.DIRECTOR.INITIAL_SPAWN_INTERVAL,
      minSpawnInterval: SIM.DIRECTOR.MIN_SPAWN_INTERVAL,
      spawnIntervalDecay: SIM.DIRECTOR.SPAWN_INTERVAL_DECAY,
      batchSize: SIM.DIRECTOR.BATCH_SIZE,
      spawnRadiusMin: SIM.DIRECTOR.SPAWN_RADIUS_MIN,
      spawnRadiusMax: SIM.DIRECTOR.SPAWN_RADIUS_MAX,
      minDistanceFromPlayer: SIM.DIRECTOR.MIN_DISTANCE_FROM_PLAYER,
      minZombieSpacing: SIM.DIRECTOR.MIN_ZOMBIE_SPACING,
      maxSpawnAttempts: SIM.DIRECTOR.MAX_SPAWN_ATTEMPTS,
      intensityFullAt: SIM.DIRECTOR.INTENSITY_FULL_AT,
      composition: SIM.DIRECTOR.COMPOSITION,
      ...overrides,
    };
    const parsed = DirectorConfigSchema.safeParse(this.config);
    if (!parsed.success) {
      throw new SimulationInputError(`Invalid director config: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    this.obstacles = obstacles;
    this.spawnTimer = this.config.firstSpawnDelay;
  }

  get spawnTimerRemaining(): number {
    return this.spawnTimer;
  }

  /** Concurrent zombie target; non-decreasing in both T and S. */
  targetCount(elapsed: number, score = 0): number {
    const cfg = this.config;
    const raw = cfg.baseTarget + cfg.targetRate * Math.max(0, elapsed) + cfg.scoreRate * Math.max(0, score);
    return Math.min(cfg.maxCap, Math.floor(raw));
  }

  /** Seconds between spawn cycles, shrinking linearly with T down to minSpawnInterval. */
  spawnInterval(elapsed: number): number {
    const cfg = this.config;
    return Math.max(cfg.minSpawnInterval, cfg.initialSpawnInterval - Math.max(0, elapsed) / cfg.spawnIntervalDecay);
  }

  /** Weights of the last breakpoint reached by T, normalized to sum to 1. */
  compositionWeights(elapsed: number): ZombieWeights {
    let current = this.config.composition[0];
    for (const breakpoint of this.config.composition) {
      if (elapsed >= breakpoint.at) current = breakpoint;
    }
    return normalizeWeights(current.weights);
  }

  pickZombieType(weights: ZombieWeights, rng: RandomSource): ZombieType {
    return weightedPick(rng, ZOMBIE_TYPES, weights);
  }

  /**
   * Samples points on the spawn ring around the player, clamped into the map.
   * A candidate is rejected when it overlaps an obstacle, lies closer than
   * minDistanceFromPlayer, or crowds an occupied position. Returns null once
   * the attempt budget is spent.
   */
  findSpawnPoint(
    player: Vec2,
    rng: RandomSource,
    radius: number,
    occupied: readonly Vec2[] = [],
  ): Vec2 | null {
    const cfg = this.config;
    const bounds = this.obstacles.bounds;

    for (let attempt = 0; attempt < cfg.maxSpawnAttempts; attempt++) {
      const angle = rng.next() * Math.PI * 2;
      const ring = cfg.spawnRadiusMin + (cfg.spawnRadiusMax - cfg.spawnRadiusMin) * rng.next();
      let x = player.x + Math.cos(angle) * ring;
      let y = player.y + Math.sin(angle) * ring;
      if (bounds) {
        x = clamp(x, radius, bounds.width - radius);
        y = clamp(y, radius, bounds.height - radius);
      }
      const candidate = { x, y };

      if (distance(candidate, player) < cfg.minDistanceFromPlayer) continue;
      if (this.obstacles.overlapsCircle(x, y, radius)) continue;
      if (occupied.some((o) => distance(candidate, o) < cfg.minZombieSpacing)) continue;
      return candidate;
    }
    return null;
  }

  /**
   * One director tick. The spawn timer counts down by dt; when it runs out
   * and the live count is below target, up to batchSize requests are emitted
   * and the timer resets to the current interval. While at target the timer
   * stays at zero so the next free slot is filled immediately.
   */
  update(ctx: SimulationContext): DirectorUpdate {
    const cfg = this.config;
    const elapsed = ctx.score.elapsed;
    const targetCount = this.targetCount(elapsed, ctx.score.score);
    const interval = this.spawnInterval(elapsed);
    const weights = this.compositionWeights(elapsed);
    const requests: SpawnRequest[] = [];

    this.spawnTimer -= ctx.clock.dt;
    if (this.spawnTimer <= 0) {
      const zombies = ctx.entities.ofKind("zombie").filter((z) => z.alive);
      const player = ctx.entities.player();

      if (zombies.length >= targetCount || !player) {
        this.spawnTimer = 0;
      } else {
        const slots = Math.min(cfg.batchSize, targetCount - zombies.length);
        const occupied: Vec2[] = zombies.map((z) => ({ x: z.x, y: z.y }));
        for (let i = 0; i < slots; i++) {
          const type = this.pickZombieType(weights, ctx.rng);
          const point = this.findSpawnPoint(player, ctx.rng, ZOMBIE_CONFIGS[type].radius, occupied);
          if (!point) {
            console.debug(
              `[ZombieManager] No spawn point after ${cfg.maxSpawnAttempts} attempts at tick ${ctx.clock.tick}, skipping cycle`,
            );
            break;
          }
          occupied.push(point);
          requests.push({ type, x: point.x, y: point.y });
        }
        this.spawnTimer = interval;
      }
    }

    return {
      directive: { weights, targetCount, spawnInterval: interval, spawnTimerRemaining: this.spawnTimer },
      requests,
    };
  }

  /** Difficulty progress for the HUD, 0 at the start and 1 from intensityFullAt on. */
  getWaveIntensity(elapsed: number): number {
    return clamp(elapsed / this.config.intensityFullAt, 0, 1);
  }
}
