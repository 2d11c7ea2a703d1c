export type ZombieType = "weak" | "fast" | "tough";

export const ZOMBIE_TYPES: readonly ZombieType[] = ["weak", "fast", "tough"];

export interface ZombieConfig {
  type: ZombieType;
  hp: number;
  damage: number;
  radius: number;
  speedMin: number; // px per second
  speedMax: number;
  attackCooldown: number; // seconds
  score: number;
}

export const ZOMBIE_CONFIGS: Record<ZombieType, ZombieConfig> = {
  weak: {
    type: "weak",
    hp: 30,
    damage: 10,
    radius: 12,
    speedMin: 60,
    speedMax: 90,
    attackCooldown: 1.0,
    score: 10,
  },
  fast: {
    type: "fast",
    hp: 20,
    damage: 8,
    radius: 10,
    speedMin: 120,
    speedMax: 150,
    attackCooldown: 0.7,
    score: 20,
  },
  tough: {
    type: "tough",
    hp: 80,
    damage: 20,
    radius: 18,
    speedMin: 40,
    speedMax: 60,
    attackCooldown: 1.2,
    score: 30,
  },
};

export type ZombieWeights = Record<ZombieType, number>;
