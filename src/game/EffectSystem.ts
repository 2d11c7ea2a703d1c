import { SIM } from "../config/game.constants.js";
import type { EntityId, PlayerEntity } from "../types/entity.js";
import { EFFECTS, type EffectType } from "../types/items.js";

export interface ActiveEffect {
  readonly type: EffectType;
  readonly value: number;
  ticksRemaining: number;
}

/**
 * Timed powerup effects per player. Applying an effect that is already
 * active replaces its value and restarts its duration. Durations count down
 * in tick(), once per simulation step.
 */
export class EffectSystem {
  private readonly tickRate: number;
  private readonly effects = new Map<EntityId, Map<EffectType, ActiveEffect>>();
  // fractional HP owed by health_regen, paid out in whole points
  private readonly regenCarry = new Map<EntityId, number>();

  constructor(tickRate: number = SIM.TICK_RATE) {
    this.tickRate = tickRate;
  }

  apply(
    ownerId: EntityId,
    type: EffectType,
    duration: number = EFFECTS[type].duration,
    value: number = EFFECTS[type].value,
  ): ActiveEffect {
    let owned = this.effects.get(ownerId);
    if (!owned) {
      owned = new Map();
      this.effects.set(ownerId, owned);
    }
    const effect: ActiveEffect = { type, value, ticksRemaining: Math.max(1, Math.round(duration * this.tickRate)) };
    owned.set(type, effect);
    return effect;
  }

  has(ownerId: EntityId, type: EffectType): boolean {
    return this.effects.get(ownerId)?.has(type) ?? false;
  }

  valueOf(ownerId: EntityId, type: EffectType, fallback: number): number {
    return this.effects.get(ownerId)?.get(type)?.value ?? fallback;
  }

  remainingTicks(ownerId: EntityId, type: EffectType): number {
    return this.effects.get(ownerId)?.get(type)?.ticksRemaining ?? 0;
  }

  /** Active effects in the order they were first applied. */
  active(ownerId: EntityId): ActiveEffect[] {
    return [...(this.effects.get(ownerId)?.values() ?? [])];
  }

  speedMultiplier(ownerId: EntityId): number {
    return this.valueOf(ownerId, "speed_boost", 1);
  }

  damageMultiplier(ownerId: EntityId): number {
    return this.valueOf(ownerId, "damage_boost", 1);
  }

  fireRateMultiplier(ownerId: EntityId): number {
    return this.valueOf(ownerId, "rapid_fire", 1);
  }

  isInvincible(ownerId: EntityId): boolean {
    return this.has(ownerId, "invincibility");
  }

  hasInfiniteAmmo(ownerId: EntityId): boolean {
    return this.has(ownerId, "infinite_ammo");
  }

  /** Heals the player by the health_regen rate over dt; returns whole HP restored. */
  regenerate(player: PlayerEntity, dt: number): number {
    const rate = this.valueOf(player.id, "health_regen", 0);
    if (rate <= 0 || !player.alive) {
      this.regenCarry.delete(player.id);
      return 0;
    }
    const carry = (this.regenCarry.get(player.id) ?? 0) + rate * dt;
    const whole = Math.floor(carry);
    this.regenCarry.set(player.id, carry - whole);
    const healed = Math.min(whole, player.maxHealth - player.health);
    player.health += healed;
    return healed;
  }

  tick(): void {
    for (const [ownerId, owned] of this.effects) {
      for (const [type, effect] of owned) {
        effect.ticksRemaining--;
        if (effect.ticksRemaining <= 0) owned.delete(type);
      }
      if (owned.size === 0) this.effects.delete(ownerId);
    }
  }

  forget(ids: Iterable<EntityId>): void {
    for (const id of ids) {
      this.effects.delete(id);
      this.regenCarry.delete(id);
    }
  }
}
