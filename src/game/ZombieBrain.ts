import { SIM } from "../config/game.constants.js";
import type { EntityId, PlayerEntity, Vec2, ZombieEntity } from "../types/entity.js";
import { ZOMBIE_CONFIGS } from "../types/zombie.js";
import type { SimulationContext } from "./context.js";
import { SimulationInputError } from "./errors.js";
import { length, normalize, rotate } from "./geometry.js";
import type { ObstacleIndex } from "./ObstacleIndex.js";

export type ZombieMode = "seeking" | "probing" | "attacking";

export interface ZombieAIState {
  mode: ZombieMode;
  /** Consecutive seeking ticks with net displacement below stuckEpsilon. */
  stuckTicks: number;
  detourHeading: Vec2 | null;
  detourTicksRemaining: number;
  /** Seconds until the next attack is allowed. */
  attackCooldown: number;
  // position at the previous evaluation, for the displacement check
  lastX: number;
  lastY: number;
}

export interface ZombieAttack {
  zombieId: EntityId;
  targetId: EntityId;
  damage: number;
}

export interface NavigationConfig {
  stuckEpsilon: number;
  stuckTicks: number;
  /** Offsets from the desired heading, in degrees, tried in order. */
  detourAngles: readonly number[];
  detourDistance: number;
  detourTimeoutTicks: number;
  /** Edge-to-edge distance at which a zombie can hit the player. */
  attackReach: number;
}

export function createZombieAIState(position: Vec2): ZombieAIState {
  return {
    mode: "seeking",
    stuckTicks: 0,
    detourHeading: null,
    detourTicksRemaining: 0,
    attackCooldown: 0,
    lastX: position.x,
    lastY: position.y,
  };
}

function setHeading(zombie: ZombieEntity, heading: Vec2): void {
  zombie.vx = heading.x * zombie.speed;
  zombie.vy = heading.y * zombie.speed;
}

function hold(zombie: ZombieEntity): void {
  zombie.vx = 0;
  zombie.vy = 0;
}

function leaveProbing(ai: ZombieAIState): void {
  ai.mode = "seeking";
  ai.stuckTicks = 0;
  ai.detourHeading = null;
  ai.detourTicksRemaining = 0;
}

/**
 * Zombie steering without graph search: head straight for the player, and
 * when net movement stalls for stuckTicks ticks, try sideways detour headings
 * against the obstacle geometry until the direct line opens up again.
 *
 * The brain only sets velocities; the actual displacement is whatever the
 * collision world leaves after resolving overlaps.
 */
export class ZombieBrain {
  readonly config: NavigationConfig;
  private readonly obstacles: ObstacleIndex;
  private readonly states = new Map<EntityId, ZombieAIState>();

  constructor(obstacles: ObstacleIndex, overrides: Partial<NavigationConfig> = {}) {
    this.config = {
      stuckEpsilon: SIM.NAVIGATION.STUCK_EPSILON,
      stuckTicks: SIM.NAVIGATION.STUCK_TICKS,
      detourAngles: SIM.NAVIGATION.DETOUR_ANGLES,
      detourDistance: SIM.NAVIGATION.DETOUR_DISTANCE,
      detourTimeoutTicks: SIM.NAVIGATION.DETOUR_TIMEOUT_TICKS,
      attackReach: SIM.NAVIGATION.ATTACK_REACH,
      ...overrides,
    };
    const cfg = this.config;
    if (cfg.stuckTicks < 1 || cfg.detourTimeoutTicks < 1 || cfg.detourAngles.length === 0) {
      throw new SimulationInputError("Navigation needs stuckTicks >= 1, detourTimeoutTicks >= 1 and detour angles");
    }
    if (!(cfg.stuckEpsilon >= 0) || !(cfg.detourDistance > 0)) {
      throw new SimulationInputError("Navigation stuckEpsilon must be >= 0 and detourDistance > 0");
    }
    this.obstacles = obstacles;
  }

  /** Sets every live zombie's velocity for this tick and returns the attacks it decided on. */
  update(ctx: SimulationContext): ZombieAttack[] {
    const player = ctx.entities.player();
    const attacks: ZombieAttack[] = [];
    for (const zombie of ctx.entities.ofKind("zombie")) {
      if (!zombie.alive) continue;
      let ai = this.states.get(zombie.id);
      if (!ai) {
        ai = createZombieAIState(zombie);
        this.states.set(zombie.id, ai);
      }
      const attack = this.decide(zombie, ai, player, ctx.clock.dt);
      if (attack) attacks.push(attack);
    }
    return attacks;
  }

  decide(
    zombie: ZombieEntity,
    ai: ZombieAIState,
    player: PlayerEntity | null,
    dt: number,
  ): ZombieAttack | null {
    const cfg = this.config;
    ai.attackCooldown = Math.max(0, ai.attackCooldown - dt);
    const moved = length(zombie.x - ai.lastX, zombie.y - ai.lastY);
    ai.lastX = zombie.x;
    ai.lastY = zombie.y;

    if (!player) {
      leaveProbing(ai);
      hold(zombie);
      return null;
    }

    const toPlayer = { x: player.x - zombie.x, y: player.y - zombie.y };
    const desired = normalize(toPlayer);
    const gap = length(toPlayer.x, toPlayer.y) - zombie.radius - player.radius;
    const inReach = gap <= cfg.attackReach;

    // an attack lasts one tick
    if (ai.mode === "attacking") ai.mode = "seeking";

    if (ai.mode === "probing") {
      if (!inReach) {
        this.detour(zombie, ai, desired, moved);
        return null;
      }
      leaveProbing(ai);
    }

    if (inReach) {
      ai.stuckTicks = 0;
      hold(zombie);
      if (ai.attackCooldown > 0) return null;
      ai.mode = "attacking";
      ai.attackCooldown = ZOMBIE_CONFIGS[zombie.zombieType].attackCooldown;
      return { zombieId: zombie.id, targetId: player.id, damage: zombie.damage };
    }

    ai.stuckTicks = moved < cfg.stuckEpsilon ? ai.stuckTicks + 1 : 0;
    if (ai.stuckTicks >= cfg.stuckTicks) {
      ai.mode = "probing";
      ai.stuckTicks = 0;
      ai.detourTicksRemaining = cfg.detourTimeoutTicks;
      ai.detourHeading = this.chooseDetourHeading(zombie, desired);
      if (ai.detourHeading) {
        setHeading(zombie, ai.detourHeading);
      } else {
        hold(zombie);
      }
      return null;
    }

    setHeading(zombie, desired);
    return null;
  }

  private detour(zombie: ZombieEntity, ai: ZombieAIState, desired: Vec2, moved: number): void {
    if (ai.detourHeading && moved >= this.config.stuckEpsilon && this.isHeadingClear(zombie, desired)) {
      leaveProbing(ai);
      setHeading(zombie, desired);
      return;
    }

    ai.detourTicksRemaining--;
    if (ai.detourTicksRemaining <= 0) {
      leaveProbing(ai);
      setHeading(zombie, desired);
      return;
    }

    // every candidate was blocked last tick: try again from the new situation
    if (!ai.detourHeading) {
      ai.detourHeading = this.chooseDetourHeading(zombie, desired);
    }
    if (ai.detourHeading) {
      setHeading(zombie, ai.detourHeading);
    } else {
      hold(zombie);
    }
  }

  /**
   * Cheap look-ahead: the zombie's circle placed halfway and fully along the
   * detour distance must not overlap any obstacle or leave the map.
   */
  isHeadingClear(zombie: ZombieEntity, heading: Vec2): boolean {
    const d = this.config.detourDistance;
    for (const step of [d / 2, d]) {
      const x = zombie.x + heading.x * step;
      const y = zombie.y + heading.y * step;
      if (this.obstacles.overlapsCircle(x, y, zombie.radius)) return false;
      if (!this.obstacles.insideBounds(x, y, zombie.radius)) return false;
    }
    return true;
  }

  /** First clear heading among the configured offsets, or null when all are blocked. */
  chooseDetourHeading(zombie: ZombieEntity, desired: Vec2): Vec2 | null {
    for (const angle of this.config.detourAngles) {
      const heading = rotate(desired, angle);
      if (this.isHeadingClear(zombie, heading)) return heading;
    }
    return null;
  }

  getState(id: EntityId): Readonly<ZombieAIState> | undefined {
    return this.states.get(id);
  }

  /** Drops AI state for entities removed at the tick boundary. */
  forget(ids: Iterable<EntityId>): void {
    for (const id of ids) {
      this.states.delete(id);
    }
  }
}
