import { z } from "zod";
import { ObstacleSchema } from "./entity.js";
import { WEAPON_TYPES, type WeaponType } from "./weapons.js";

const finite = z.number().finite();

// ─── Client → Server ───

export const PlayerMoveSchema = z.object({
  dx: finite.min(-1).max(1),
  dy: finite.min(-1).max(1),
});
export type PlayerMove = z.infer<typeof PlayerMoveSchema>;

export const PlayerFireSchema = z.object({
  /** Aim direction in radians, measured from the +x axis. */
  angle: finite,
  weapon: z
    .string()
    .refine((w): w is WeaponType => WEAPON_TYPES.some((t) => t === w), { message: "unknown weapon" })
    .optional(),
});
export type PlayerFire = z.infer<typeof PlayerFireSchema>;

/** Either a slot to jump to or a direction to cycle through occupied slots. */
export const SwitchWeaponSchema = z.union([
  z.object({ slot: z.number().int().min(0) }),
  z.object({ direction: z.union([z.literal(1), z.literal(-1)]) }),
]);
export type SwitchWeapon = z.infer<typeof SwitchWeaponSchema>;

// ─── Room options ───

const nonNegative = finite.nonnegative();

export const SurvivalRoomOptionsSchema = z.object({
  seed: z.number().int().optional(),
  obstacleCount: z.number().int().min(0).max(400).optional(),
  /** Fixed geometry; replaces the generated map when given. */
  obstacles: z.array(ObstacleSchema).max(1000).optional(),
  playerHealth: z.number().int().positive().optional(),
  director: z
    .object({
      baseTarget: nonNegative,
      targetRate: nonNegative,
      scoreRate: nonNegative,
      maxCap: z.number().int().nonnegative(),
      firstSpawnDelay: nonNegative,
      initialSpawnInterval: finite.positive(),
      minSpawnInterval: finite.positive(),
      batchSize: z.number().int().positive(),
      spawnRadiusMin: nonNegative,
      spawnRadiusMax: nonNegative,
      minDistanceFromPlayer: nonNegative,
    })
    .partial()
    .optional(),
  navigation: z
    .object({
      stuckEpsilon: nonNegative,
      stuckTicks: z.number().int().positive(),
      detourDistance: finite.positive(),
      detourTimeoutTicks: z.number().int().positive(),
    })
    .partial()
    .optional(),
  items: z
    .object({
      maxItems: z.number().int().nonnegative(),
      itemInterval: finite.positive(),
      powerupInterval: finite.positive(),
    })
    .partial()
    .optional(),
  dropChance: finite.min(0).max(1).optional(),
});
export type SurvivalRoomOptions = z.infer<typeof SurvivalRoomOptionsSchema>;

// ─── Server → Client Broadcast Events ───

export interface GameOverEvent {
  tick: number;
  elapsed: number;
  score: number;
  kills: number;
}

export interface KillEvent {
  tick: number;
  victimId: number;
  zombieType: string;
  scoreAfter: number;
}

export interface ItemPickedUpEvent {
  tick: number;
  pickupType: string;
  weapon: string | null;
  healed: number;
}

export interface PlayerHitEvent {
  tick: number;
  damage: number;
  healthAfter: number;
}
