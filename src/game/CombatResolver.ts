import { SIM } from "../config/game.constants.js";
import {
  isDamageable,
  type CollisionEvent,
  type DamageableEntity,
  type EntityId,
  type PickupEntity,
  type PlayerEntity,
  type ProjectileEntity,
  type ZombieEntity,
} from "../types/entity.js";
import type { PickupType } from "../types/items.js";
import type { WeaponType } from "../types/weapons.js";
import type { ZombieType } from "../types/zombie.js";
import type { SimulationContext } from "./context.js";
import type { EffectSystem } from "./EffectSystem.js";
import { distance } from "./geometry.js";
import type { ScoreSystem } from "./ScoreSystem.js";
import type { WeaponSystem } from "./WeaponSystem.js";
import type { ZombieAttack } from "./ZombieBrain.js";

export interface HitResult {
  hit: boolean;
  damage: number;
  killed: boolean;
}

const MISS: HitResult = { hit: false, damage: 0, killed: false };

function applyDamage(target: DamageableEntity, amount: number): HitResult {
  const damage = Math.max(0, Math.min(amount, target.health));
  target.health -= damage;
  const killed = target.health <= 0;
  if (killed) {
    target.health = 0;
    target.alive = false;
  }
  return { hit: true, damage, killed };
}

/** Projectile lands on a player or zombie. Dead targets absorb nothing. */
export function resolveProjectileHit(projectile: ProjectileEntity, target: DamageableEntity): HitResult {
  if (!target.alive) return MISS;
  return applyDamage(target, projectile.damage);
}

/** Zombie melee on the player. */
export function resolveZombieAttack(attack: ZombieAttack, player: PlayerEntity): HitResult {
  if (!player.alive) return MISS;
  return applyDamage(player, attack.damage);
}

/** Systems a pickup can act on. */
export interface PlayerGear {
  readonly weapons: WeaponSystem;
  readonly effects: EffectSystem;
}

export interface PickupResult {
  pickupType: PickupType;
  healed: number;
  weapon: WeaponType | null;
}

/**
 * Player walks over a pickup. Returns what it did, or null when it was left
 * on the ground: a medkit at full health, or a new weapon with no free slot.
 */
export function resolvePickup(player: PlayerEntity, pickup: PickupEntity, gear: PlayerGear): PickupResult | null {
  if (!player.alive || !pickup.alive) return null;
  let healed = 0;

  switch (pickup.pickupType) {
    case "medkit":
      if (player.health >= player.maxHealth) return null;
      healed = Math.min(pickup.amount, player.maxHealth - player.health);
      player.health += healed;
      break;
    case "ammo":
      gear.effects.apply(player.id, "infinite_ammo");
      gear.weapons.refillCurrent(player.id);
      break;
    case "weapon":
      if (!pickup.weapon || !gear.weapons.grantWeapon(player.id, pickup.weapon)) return null;
      break;
    default:
      gear.effects.apply(player.id, pickup.pickupType);
  }

  pickup.alive = false;
  return { pickupType: pickup.pickupType, healed, weapon: pickup.weapon };
}

export interface KillRecord {
  victimId: EntityId;
  killerId: EntityId;
  zombieType: ZombieType;
}

export interface PickupRecord extends PickupResult {
  pickupId: EntityId;
}

export interface CombatOutcome {
  kills: KillRecord[];
  playerDamage: number;
  healed: number;
  pickups: PickupRecord[];
  drops: EntityId[];
  playerKilled: boolean;
}

export interface CombatOptions {
  dropChance?: number;
}

/**
 * Default damage and score application: consumes the tick's collision events
 * and the zombies' attack intents. Projectile hits are applied first, so a
 * zombie shot dead this tick does not land its own attack. Explosive rounds
 * also damage every other zombie within their radius of the point of impact.
 * An invincible player takes no damage.
 */
export function applyCombat(
  ctx: SimulationContext,
  events: readonly CollisionEvent[],
  attacks: readonly ZombieAttack[],
  score: ScoreSystem,
  gear: PlayerGear,
  options: CombatOptions = {},
): CombatOutcome {
  const dropChance = options.dropChance ?? SIM.PICKUP.DROP_CHANCE;
  const outcome: CombatOutcome = {
    kills: [],
    playerDamage: 0,
    healed: 0,
    pickups: [],
    drops: [],
    playerKilled: false,
  };

  const hitZombie = (zombie: ZombieEntity, projectile: ProjectileEntity): void => {
    if (!resolveProjectileHit(projectile, zombie).killed) return;
    score.addKill(zombie.zombieType);
    outcome.kills.push({ victimId: zombie.id, killerId: projectile.ownerId, zombieType: zombie.zombieType });
    if (dropChance > 0 && ctx.rng.next() < dropChance) {
      outcome.drops.push(ctx.entities.spawnPickup("medkit", { x: zombie.x, y: zombie.y }).id);
    }
  };

  const hitPlayer = (player: PlayerEntity, projectile: ProjectileEntity): void => {
    if (gear.effects.isInvincible(player.id)) return;
    const result = resolveProjectileHit(projectile, player);
    outcome.playerDamage += result.damage;
    if (result.killed) outcome.playerKilled = true;
  };

  for (const event of events) {
    if (event.kind === "projectile-hit") {
      const projectile = ctx.entities.get(event.entityA);
      const target = ctx.entities.get(event.entityB);
      if (!projectile || projectile.kind !== "projectile" || !target || !isDamageable(target)) continue;
      if (target.kind === "player") {
        hitPlayer(target, projectile);
      } else {
        hitZombie(target, projectile);
      }

      if (projectile.explosionRadius > 0) {
        const impact = { x: projectile.x - event.penetration.x, y: projectile.y - event.penetration.y };
        for (const zombie of ctx.entities.ofKind("zombie")) {
          if (zombie === target || distance(zombie, impact) > projectile.explosionRadius + zombie.radius) continue;
          hitZombie(zombie, projectile);
        }
      }
    } else if (event.kind === "entity-entity") {
      const a = ctx.entities.get(event.entityA);
      const b = ctx.entities.get(event.entityB);
      if (!a || !b) continue;
      const player = a.kind === "player" ? a : b.kind === "player" ? b : null;
      const pickup = a.kind === "pickup" ? a : b.kind === "pickup" ? b : null;
      if (!player || !pickup) continue;
      const result = resolvePickup(player, pickup, gear);
      if (result) {
        outcome.healed += result.healed;
        outcome.pickups.push({ pickupId: pickup.id, ...result });
      }
    }
  }

  for (const attack of attacks) {
    const zombie = ctx.entities.get(attack.zombieId);
    const target = ctx.entities.get(attack.targetId);
    if (!zombie || !zombie.alive || !target || target.kind !== "player") continue;
    if (gear.effects.isInvincible(target.id)) continue;
    const result = resolveZombieAttack(attack, target);
    outcome.playerDamage += result.damage;
    if (result.killed) outcome.playerKilled = true;
  }

  return outcome;
}
