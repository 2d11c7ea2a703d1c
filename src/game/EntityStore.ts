import { SIM } from "../config/game.constants.js";
import {
  CAPABILITIES,
  Vec2Schema,
  type Entity,
  type EntityId,
  type EntityKind,
  type PickupEntity,
  type PlayerEntity,
  type ProjectileEntity,
  type Vec2,
  type ZombieEntity,
} from "../types/entity.js";
import type { PickupType } from "../types/items.js";
import type { WeaponType } from "../types/weapons.js";
import { ZOMBIE_CONFIGS, type ZombieType } from "../types/zombie.js";
import { SimulationInputError } from "./errors.js";
import type { RandomSource } from "./Rng.js";

/** Creates zombies for the director's spawn requests. */
export interface EntityFactory {
  spawn(type: ZombieType, position: Vec2): EntityId;
}

export interface EntityStoreOptions {
  /** Largest radius the broad phase can handle (half a grid cell). */
  maxRadius?: number;
  /** Source for per-zombie speed rolls; without one zombies get their type's minimum speed. */
  rng?: RandomSource;
}

export interface PlayerSpawnOptions {
  radius?: number;
  speed?: number;
  health?: number;
}

export interface ZombieSpawnOptions {
  radius?: number;
  speed?: number;
}

export interface ProjectileSpawnOptions {
  damage: number;
  radius: number;
  ticks: number;
  explosionRadius?: number;
}

export interface PickupSpawnOptions {
  /** Required for "weapon" pickups. */
  weapon?: WeaponType;
  /** Lifetime in ticks; null keeps the pickup until it is collected. */
  ticks?: number | null;
}

type EntityOfKind<K extends EntityKind> = Extract<Entity, { kind: K }>;

/**
 * Owns every entity for its lifetime. Ids increase monotonically and are never
 * handed out twice. Removal is deferred: dead or expired entities stay in the
 * store (alive = false) until flushRemovals() runs at the tick boundary.
 */
export class EntityStore implements EntityFactory {
  private readonly entities = new Map<EntityId, Entity>();
  private nextId = 1;
  private readonly maxRadius: number;
  private readonly rng: RandomSource | null;

  constructor(options: EntityStoreOptions = {}) {
    this.maxRadius = options.maxRadius ?? SIM.COLLISION.CELL_SIZE / 2;
    this.rng = options.rng ?? null;
  }

  spawn(type: ZombieType, position: Vec2): EntityId {
    return this.spawnZombie(type, position).id;
  }

  spawnPlayer(position: Vec2, opts: PlayerSpawnOptions = {}): PlayerEntity {
    const health = opts.health ?? SIM.PLAYER.HEALTH;
    return this.admit<PlayerEntity>({
      id: this.nextId,
      kind: "player",
      x: position.x,
      y: position.y,
      vx: 0,
      vy: 0,
      radius: opts.radius ?? SIM.PLAYER.RADIUS,
      alive: true,
      caps: CAPABILITIES.player,
      health,
      maxHealth: health,
      speed: opts.speed ?? SIM.PLAYER.SPEED,
      weapon: "pistol",
    });
  }

  spawnZombie(type: ZombieType, position: Vec2, opts: ZombieSpawnOptions = {}): ZombieEntity {
    const config = ZOMBIE_CONFIGS[type];
    const speed = opts.speed ??
      (this.rng ? config.speedMin + (config.speedMax - config.speedMin) * this.rng.next() : config.speedMin);
    return this.admit<ZombieEntity>({
      id: this.nextId,
      kind: "zombie",
      zombieType: type,
      x: position.x,
      y: position.y,
      vx: 0,
      vy: 0,
      radius: opts.radius ?? config.radius,
      alive: true,
      caps: CAPABILITIES.zombie,
      health: config.hp,
      maxHealth: config.hp,
      speed,
      damage: config.damage,
    });
  }

  spawnProjectile(
    ownerId: EntityId,
    position: Vec2,
    velocity: Vec2,
    opts: ProjectileSpawnOptions,
  ): ProjectileEntity {
    return this.admit<ProjectileEntity>({
      id: this.nextId,
      kind: "projectile",
      ownerId,
      x: position.x,
      y: position.y,
      prevX: position.x,
      prevY: position.y,
      vx: velocity.x,
      vy: velocity.y,
      radius: opts.radius,
      alive: true,
      caps: CAPABILITIES.projectile,
      damage: opts.damage,
      explosionRadius: opts.explosionRadius ?? 0,
      ticksRemaining: opts.ticks,
    });
  }

  spawnPickup(type: PickupType, position: Vec2, opts: PickupSpawnOptions = {}): PickupEntity {
    if (type === "weapon" && !opts.weapon) {
      throw new SimulationInputError("Rejected pickup: weapon pickups need a weapon type");
    }
    return this.admit<PickupEntity>({
      id: this.nextId,
      kind: "pickup",
      pickupType: type,
      x: position.x,
      y: position.y,
      vx: 0,
      vy: 0,
      radius: SIM.PICKUP.RADIUS,
      alive: true,
      caps: CAPABILITIES.pickup,
      amount: type === "medkit" ? SIM.PICKUP.MEDKIT_HEAL : 0,
      weapon: type === "weapon" ? opts.weapon ?? null : null,
      ticksRemaining: opts.ticks === undefined ? SIM.PICKUP.LIFETIME_TICKS : opts.ticks,
    });
  }

  private admit<T extends Entity>(entity: T): T {
    const position = Vec2Schema.safeParse({ x: entity.x, y: entity.y });
    if (!position.success) {
      throw new SimulationInputError(
        `Rejected ${entity.kind}: non-finite position (${entity.x}, ${entity.y})`,
      );
    }
    const velocity = Vec2Schema.safeParse({ x: entity.vx, y: entity.vy });
    if (!velocity.success) {
      throw new SimulationInputError(
        `Rejected ${entity.kind}: non-finite velocity (${entity.vx}, ${entity.vy})`,
      );
    }
    if (!Number.isFinite(entity.radius) || entity.radius < 0) {
      throw new SimulationInputError(`Rejected ${entity.kind}: invalid radius ${entity.radius}`);
    }
    if (entity.radius > this.maxRadius) {
      throw new SimulationInputError(
        `Rejected ${entity.kind}: radius ${entity.radius} exceeds grid limit ${this.maxRadius}`,
      );
    }
    this.entities.set(entity.id, entity);
    this.nextId++;
    return entity;
  }

  get(id: EntityId): Entity | undefined {
    return this.entities.get(id);
  }

  /** The first live player, if any. */
  player(): PlayerEntity | null {
    for (const e of this.entities.values()) {
      if (e.kind === "player" && e.alive) return e;
    }
    return null;
  }

  /** Every entity still in the store, ordered by id. */
  all(): Entity[] {
    return [...this.entities.values()];
  }

  ofKind<K extends EntityKind>(kind: K): EntityOfKind<K>[] {
    const result: EntityOfKind<K>[] = [];
    for (const e of this.entities.values()) {
      if (isKind(e, kind)) result.push(e);
    }
    return result;
  }

  countAlive(kind: EntityKind): number {
    let n = 0;
    for (const e of this.entities.values()) {
      if (e.kind === kind && e.alive) n++;
    }
    return n;
  }

  /** Deletes every entity that is no longer alive. Only call between ticks. */
  flushRemovals(): EntityId[] {
    const removed: EntityId[] = [];
    for (const [id, e] of this.entities) {
      if (!e.alive) removed.push(id);
    }
    for (const id of removed) {
      this.entities.delete(id);
    }
    return removed;
  }

  get size(): number {
    return this.entities.size;
  }
}

function isKind<K extends EntityKind>(e: Entity, kind: K): e is EntityOfKind<K> {
  return e.kind === kind;
}
