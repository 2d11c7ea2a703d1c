import { z } from "zod";
import type { PickupType } from "./items.js";
import type { WeaponType } from "./weapons.js";
import type { ZombieType } from "./zombie.js";

export type EntityId = number;

export interface Vec2 {
  x: number;
  y: number;
}

export type EntityKind = "player" | "zombie" | "projectile" | "pickup";

export interface Capabilities {
  movable: boolean;
  damageable: boolean;
  collidable: boolean;
}

export const CAPABILITIES: Record<EntityKind, Capabilities> = {
  player: { movable: true, damageable: true, collidable: true },
  zombie: { movable: true, damageable: true, collidable: true },
  projectile: { movable: true, damageable: false, collidable: false },
  pickup: { movable: false, damageable: false, collidable: false },
};

interface EntityBase {
  readonly id: EntityId;
  x: number;
  y: number;
  vx: number;
  vy: number;
  readonly radius: number;
  /** false once dead or expired; the entity leaves the store at the next tick boundary */
  alive: boolean;
  readonly caps: Capabilities;
}

export interface PlayerEntity extends EntityBase {
  readonly kind: "player";
  health: number;
  readonly maxHealth: number;
  readonly speed: number;
  weapon: WeaponType;
}

export interface ZombieEntity extends EntityBase {
  readonly kind: "zombie";
  readonly zombieType: ZombieType;
  health: number;
  readonly maxHealth: number;
  readonly speed: number;
  readonly damage: number;
}

export interface ProjectileEntity extends EntityBase {
  readonly kind: "projectile";
  readonly ownerId: EntityId;
  readonly damage: number;
  /** Splash radius around the point of impact; 0 for direct hits only. */
  readonly explosionRadius: number;
  // position at the start of the current tick, for swept hit tests
  prevX: number;
  prevY: number;
  ticksRemaining: number;
}

export interface PickupEntity extends EntityBase {
  readonly kind: "pickup";
  readonly pickupType: PickupType;
  /** Health restored by a medkit; 0 for every other pickup. */
  readonly amount: number;
  /** The weapon granted by a "weapon" pickup. */
  readonly weapon: WeaponType | null;
  /** null for pickups that stay until collected. */
  ticksRemaining: number | null;
}

export type Entity = PlayerEntity | ZombieEntity | ProjectileEntity | PickupEntity;

export type DamageableEntity = PlayerEntity | ZombieEntity;

export function isDamageable(entity: Entity): entity is DamageableEntity {
  return entity.kind === "player" || entity.kind === "zombie";
}

/** Player or zombie: the entities that push each other and get pushed out of obstacles. */
export function isDynamic(entity: Entity): entity is DamageableEntity {
  return entity.caps.movable && entity.caps.collidable;
}

export type ObstacleId = number;

export type Obstacle =
  | { kind: "circle"; id: ObstacleId; x: number; y: number; radius: number }
  | { kind: "box"; id: ObstacleId; minX: number; minY: number; maxX: number; maxY: number };

export type CollisionEventKind = "entity-entity" | "entity-obstacle" | "projectile-hit";

export interface CollisionEvent {
  kind: CollisionEventKind;
  entityA: EntityId;
  /** Entity id, or the obstacle id for "entity-obstacle" events. */
  entityB: EntityId | ObstacleId;
  penetration: Vec2;
}

const finite = z.number().finite();

export const Vec2Schema = z.object({ x: finite, y: finite });

export const ObstacleSchema = z
  .union([
    z.object({
      kind: z.literal("circle"),
      id: z.number().int().nonnegative(),
      x: finite,
      y: finite,
      radius: finite.nonnegative(),
    }),
    z.object({
      kind: z.literal("box"),
      id: z.number().int().nonnegative(),
      minX: finite,
      minY: finite,
      maxX: finite,
      maxY: finite,
    }),
  ])
  .refine((o) => o.kind !== "box" || (o.minX <= o.maxX && o.minY <= o.maxY), {
    message: "box min corner must not exceed max corner",
  });
