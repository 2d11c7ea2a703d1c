import { z } from "zod";
import { SIM } from "../config/game.constants.js";
import type { Vec2 } from "../types/entity.js";
import {
  BASIC_PICKUP_TYPES,
  BASIC_PICKUP_WEIGHTS,
  POWERUP_TYPES,
  POWERUP_WEIGHTS,
  WEAPON_PICKUP_WEIGHTS,
  type PickupType,
} from "../types/items.js";
import { WEAPON_TYPES, type WeaponType } from "../types/weapons.js";
import type { SimulationContext } from "./context.js";
import { SimulationInputError } from "./errors.js";
import { distance } from "./geometry.js";
import type { ObstacleIndex } from "./ObstacleIndex.js";
import { weightedPick, type RandomSource } from "./Rng.js";

export interface ItemSpawnerConfig {
  maxItems: number;
  itemInterval: number;
  powerupInterval: number;
  maxSpawnAttempts: number;
  minItemSpacing: number;
  wallClearance: number;
  nearPlayerRadiusMin: number;
  nearPlayerRadiusMax: number;
}

export interface ItemSpawnRequest {
  type: PickupType;
  weapon: WeaponType | null;
  x: number;
  y: number;
}

const nonNegative = z.number().finite().nonnegative();
const positive = z.number().finite().positive();

const ItemSpawnerConfigSchema = z
  .object({
    maxItems: z.number().int().nonnegative(),
    itemInterval: positive,
    powerupInterval: positive,
    maxSpawnAttempts: z.number().int().positive(),
    minItemSpacing: nonNegative,
    wallClearance: nonNegative,
    nearPlayerRadiusMin: nonNegative,
    nearPlayerRadiusMax: nonNegative,
  })
  .refine((c) => c.nearPlayerRadiusMin <= c.nearPlayerRadiusMax, {
    message: "nearPlayerRadiusMin must not exceed nearPlayerRadiusMax",
  });

/**
 * Scatters pickups over the map on two timers: basic items (medkits, ammo,
 * weapons) and rarer powerups. Like the director it only returns requests;
 * the simulation admits them through the entity store.
 */
export class ItemSpawner {
  readonly config: ItemSpawnerConfig;
  private readonly obstacles: ObstacleIndex;
  private itemTimer: number;
  private powerupTimer: number;

  constructor(obstacles: ObstacleIndex, overrides: Partial<ItemSpawnerConfig> = {}) {
    this.config = {
      maxItems: SIM.ITEMS.MAX_ITEMS,
      itemInterval: SIM.ITEMS.ITEM_INTERVAL,
      powerupInterval: SIM.ITEMS.POWERUP_INTERVAL,
      maxSpawnAttempts: SIM.ITEMS.MAX_SPAWN_ATTEMPTS,
      minItemSpacing: SIM.ITEMS.MIN_ITEM_SPACING,
      wallClearance: SIM.ITEMS.WALL_CLEARANCE,
      nearPlayerRadiusMin: SIM.ITEMS.NEAR_PLAYER_RADIUS.min,
      nearPlayerRadiusMax: SIM.ITEMS.NEAR_PLAYER_RADIUS.max,
      ...overrides,
    };
    const parsed = ItemSpawnerConfigSchema.safeParse(this.config);
    if (!parsed.success) {
      throw new SimulationInputError(`Invalid item spawner config: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    this.obstacles = obstacles;
    this.itemTimer = this.config.itemInterval;
    this.powerupTimer = this.config.powerupInterval;
  }

  get itemTimerRemaining(): number {
    return this.itemTimer;
  }

  get powerupTimerRemaining(): number {
    return this.powerupTimer;
  }

  /** Basic item by weight; weapon pickups also draw which weapon. */
  rollBasicItem(rng: RandomSource): { type: PickupType; weapon: WeaponType | null } {
    const type = weightedPick(rng, BASIC_PICKUP_TYPES, BASIC_PICKUP_WEIGHTS);
    const weapon = type === "weapon" ? weightedPick(rng, WEAPON_TYPES, WEAPON_PICKUP_WEIGHTS) : null;
    return { type, weapon };
  }

  rollPowerup(rng: RandomSource): PickupType {
    return weightedPick(rng, POWERUP_TYPES, POWERUP_WEIGHTS);
  }

  /**
   * Samples candidates anywhere on a bounded map, or on a ring around the
   * player when the map is unbounded. A candidate is rejected when it leaves
   * the map, comes within wallClearance of an obstacle, or crowds an existing
   * item. Returns null once the attempt budget is spent.
   */
  findSpawnPoint(player: Vec2, rng: RandomSource, radius: number, occupied: readonly Vec2[] = []): Vec2 | null {
    const cfg = this.config;
    const bounds = this.obstacles.bounds;

    for (let attempt = 0; attempt < cfg.maxSpawnAttempts; attempt++) {
      let candidate: Vec2;
      if (bounds) {
        candidate = { x: rng.next() * bounds.width, y: rng.next() * bounds.height };
      } else {
        const angle = rng.next() * Math.PI * 2;
        const ring = cfg.nearPlayerRadiusMin + (cfg.nearPlayerRadiusMax - cfg.nearPlayerRadiusMin) * rng.next();
        candidate = { x: player.x + Math.cos(angle) * ring, y: player.y + Math.sin(angle) * ring };
      }

      if (!this.obstacles.insideBounds(candidate.x, candidate.y, radius)) continue;
      if (this.obstacles.overlapsCircle(candidate.x, candidate.y, radius + cfg.wallClearance)) continue;
      if (occupied.some((o) => distance(candidate, o) < cfg.minItemSpacing)) continue;
      return candidate;
    }
    return null;
  }

  /**
   * One spawner tick. Each timer counts down by dt; when it runs out a single
   * item is placed if the map holds fewer than maxItems pickups, and the timer
   * restarts whether or not a position was found. Nothing spawns without a
   * live player.
   */
  update(ctx: SimulationContext): ItemSpawnRequest[] {
    const requests: ItemSpawnRequest[] = [];
    const player = ctx.entities.player();
    if (!player) return requests;

    this.itemTimer -= ctx.clock.dt;
    this.powerupTimer -= ctx.clock.dt;
    const items = ctx.entities.ofKind("pickup").filter((p) => p.alive);
    const occupied: Vec2[] = items.map((p) => ({ x: p.x, y: p.y }));

    const place = (type: PickupType, weapon: WeaponType | null): void => {
      if (items.length + requests.length >= this.config.maxItems) return;
      const point = this.findSpawnPoint(player, ctx.rng, SIM.PICKUP.RADIUS, occupied);
      if (!point) {
        console.debug(`[ItemSpawner] No position for ${type} at tick ${ctx.clock.tick}, skipping`);
        return;
      }
      occupied.push(point);
      requests.push({ type, weapon, x: point.x, y: point.y });
    };

    if (this.itemTimer <= 0) {
      const { type, weapon } = this.rollBasicItem(ctx.rng);
      place(type, weapon);
      this.itemTimer = this.config.itemInterval;
    }
    if (this.powerupTimer <= 0) {
      place(this.rollPowerup(ctx.rng), null);
      this.powerupTimer = this.config.powerupInterval;
    }
    return requests;
  }
}
