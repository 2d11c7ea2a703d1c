export type WeaponType = "pistol" | "shotgun" | "assault_rifle" | "sniper_rifle" | "bazooka";

export const WEAPON_TYPES: readonly WeaponType[] = ["pistol", "shotgun", "assault_rifle", "sniper_rifle", "bazooka"];

/** Weakest to strongest; picking up a higher tier switches to it. */
export const WEAPON_HIERARCHY: readonly WeaponType[] = ["pistol", "shotgun", "sniper_rifle", "assault_rifle", "bazooka"];

export interface WeaponConfig {
  type: WeaponType;
  damage: number;
  projectileSpeed: number; // px per second
  projectileRadius: number;
  range: number; // px travelled before the projectile expires
  cooldown: number; // seconds between shots
  pellets: number;
  spread: number; // total fan angle in radians
  magazineSize: number;
  reloadTime: number; // seconds
  explosionRadius: number; // 0 for direct-hit weapons
}

export const WEAPON_CONFIGS: Record<WeaponType, WeaponConfig> = {
  pistol: {
    type: "pistol",
    damage: 15,
    projectileSpeed: 900,
    projectileRadius: 3,
    range: 900,
    cooldown: 0.3,
    pellets: 1,
    spread: 0,
    magazineSize: 12,
    reloadTime: 1.2,
    explosionRadius: 0,
  },
  shotgun: {
    type: "shotgun",
    damage: 8,
    projectileSpeed: 800,
    projectileRadius: 3,
    range: 450,
    cooldown: 0.9,
    pellets: 5,
    spread: 0.35,
    magazineSize: 6,
    reloadTime: 2,
    explosionRadius: 0,
  },
  assault_rifle: {
    type: "assault_rifle",
    damage: 12,
    projectileSpeed: 1000,
    projectileRadius: 3,
    range: 1100,
    cooldown: 0.1,
    pellets: 1,
    spread: 0,
    magazineSize: 30,
    reloadTime: 2.2,
    explosionRadius: 0,
  },
  sniper_rifle: {
    type: "sniper_rifle",
    damage: 60,
    projectileSpeed: 1600,
    projectileRadius: 4,
    range: 2000,
    cooldown: 1.2,
    pellets: 1,
    spread: 0,
    magazineSize: 5,
    reloadTime: 2.5,
    explosionRadius: 0,
  },
  bazooka: {
    type: "bazooka",
    damage: 50,
    projectileSpeed: 350,
    projectileRadius: 8,
    range: 1200,
    cooldown: 1.5,
    pellets: 1,
    spread: 0,
    magazineSize: 1,
    reloadTime: 3,
    explosionRadius: 80,
  },
};
