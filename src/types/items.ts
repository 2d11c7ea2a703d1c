import type { WeaponType } from "./weapons.js";

export type BasicPickupType = "medkit" | "ammo" | "weapon";

export type PowerupType = "speed_boost" | "damage_boost" | "health_regen" | "invincibility" | "rapid_fire";

export type PickupType = BasicPickupType | PowerupType;

/** Timed effects on the player. "ammo" pickups grant infinite_ammo. */
export type EffectType = PowerupType | "infinite_ammo";

export const BASIC_PICKUP_TYPES: readonly BasicPickupType[] = ["medkit", "ammo", "weapon"];

export const POWERUP_TYPES: readonly PowerupType[] = [
  "speed_boost",
  "damage_boost",
  "health_regen",
  "invincibility",
  "rapid_fire",
];

export interface EffectDefinition {
  duration: number; // seconds
  /** Multiplier for boosts, HP per second for health_regen, 1 for on/off effects. */
  value: number;
}

export const EFFECTS: Record<EffectType, EffectDefinition> = {
  speed_boost: { duration: 15, value: 1.5 },
  damage_boost: { duration: 10, value: 2 },
  health_regen: { duration: 20, value: 2 },
  invincibility: { duration: 5, value: 1 },
  rapid_fire: { duration: 8, value: 3 },
  infinite_ammo: { duration: 15, value: 1 },
};

// Spawn weights; higher is more common.
export const BASIC_PICKUP_WEIGHTS: Record<BasicPickupType, number> = {
  medkit: 40,
  ammo: 30,
  weapon: 20,
};

export const POWERUP_WEIGHTS: Record<PowerupType, number> = {
  speed_boost: 35,
  damage_boost: 10,
  health_regen: 10,
  rapid_fire: 8,
  invincibility: 2,
};

// Every player starts with a pistol, so it is never dropped.
export const WEAPON_PICKUP_WEIGHTS: Record<WeaponType, number> = {
  pistol: 0,
  shotgun: 25,
  assault_rifle: 20,
  sniper_rifle: 15,
  bazooka: 5,
};

