export const SIM = {
  TICK_RATE: 60,
  TICK_MS: 1000 / 60,
  MAX_STEPS_PER_ADVANCE: 5, // catch-up cap when a frame arrives late
  MAP_WIDTH: 3200,
  MAP_HEIGHT: 3200,
  PLAYER: {
    RADIUS: 16,
    SPEED: 200, // px per second
    HEALTH: 100,
    START_CLEAR_RADIUS: 240, // no obstacles this close to the start point
  },
  COLLISION: {
    CELL_SIZE: 64, // must be >= largest entity diameter
    EPSILON: 1e-6,
    MAX_PAIR_PASSES: 256, // dense hordes settle well inside this
    OBSTACLE_ITERATIONS: 2,
    MASS: { player: 1, zombie: 1 },
    STOP_PROJECTILES_AT_OBSTACLES: false,
  },
  NAVIGATION: {
    STUCK_EPSILON: 0.1, // px of net displacement per tick
    STUCK_TICKS: 10,
    DETOUR_ANGLES: [0, 45, -45, 90, -90, 180],
    DETOUR_DISTANCE: 24,
    DETOUR_TIMEOUT_TICKS: 45,
    ATTACK_REACH: 8, // edge-to-edge distance
  },
  DIRECTOR: {
    BASE_TARGET: 4,
    TARGET_RATE: 0.1, // extra concurrent zombies per second survived
    SCORE_RATE: 0, // extra concurrent zombies per score point
    MAX_CAP: 60,
    FIRST_SPAWN_DELAY: 2,
    INITIAL_SPAWN_INTERVAL: 2.0, // seconds
    MIN_SPAWN_INTERVAL: 0.4,
    SPAWN_INTERVAL_DECAY: 60, // seconds survived per 1s of interval removed
    BATCH_SIZE: 1,
    SPAWN_RADIUS_MIN: 500,
    SPAWN_RADIUS_MAX: 700,
    MIN_DISTANCE_FROM_PLAYER: 450,
    MIN_ZOMBIE_SPACING: 40,
    MAX_SPAWN_ATTEMPTS: 20,
    INTENSITY_FULL_AT: 300, // seconds until wave intensity reaches 1
    COMPOSITION: [
      { at: 0, weights: { weak: 1, fast: 0, tough: 0 } },
      { at: 30, weights: { weak: 0.7, fast: 0.2, tough: 0.1 } },
      { at: 90, weights: { weak: 0.6, fast: 0.2, tough: 0.2 } },
      { at: 180, weights: { weak: 0.45, fast: 0.3, tough: 0.25 } },
      { at: 300, weights: { weak: 0.35, fast: 0.35, tough: 0.3 } },
    ],
  },
  OBSTACLES: {
    COUNT: 70,
    CIRCLE_SHARE: 0.6, // trees and rocks; the rest are buildings and crates
    CIRCLE_RADIUS: { min: 14, max: 40 },
    BOX_SIZE: { min: 32, max: 160 },
    GAP: 48, // free corridor kept between neighbouring obstacles
    EDGE_MARGIN: 64,
    MAX_ATTEMPTS: 40, // per obstacle
  },
  PICKUP: {
    RADIUS: 10,
    MEDKIT_HEAL: 25,
    LIFETIME_TICKS: 900, // 15s, for kill drops; spawned items stay until collected
    DROP_CHANCE: 0.15,
  },
  ITEMS: {
    MAX_ITEMS: 20,
    ITEM_INTERVAL: 8, // seconds between basic item spawns
    POWERUP_INTERVAL: 25,
    MAX_SPAWN_ATTEMPTS: 50,
    MIN_ITEM_SPACING: 50,
    WALL_CLEARANCE: 16,
    NEAR_PLAYER_RADIUS: { min: 100, max: 300 }, // used on an unbounded map
  },
  WEAPONS: {
    MAX_SLOTS: 5,
  },
  SCORE: {
    SURVIVAL_POINTS_PER_SECOND: 1,
  },
} as const;
