import { SIM } from "../config/game.constants.js";
import {
  isDamageable,
  isDynamic,
  type CollisionEvent,
  type DamageableEntity,
  type Entity,
  type Obstacle,
  type ProjectileEntity,
  type Vec2,
} from "../types/entity.js";
import { SimulationInputError } from "./errors.js";
import { clamp, closestPointOnBox, length, segmentCircleTime, tieBreakDirection } from "./geometry.js";
import type { ObstacleIndex } from "./ObstacleIndex.js";
import { SpatialHashGrid } from "./SpatialHashGrid.js";

export interface CollisionConfig {
  cellSize: number;
  /** Overlap at or below this depth counts as touching. */
  epsilon: number;
  /** Safety cap on push passes; resolution normally stops at the first pass that moves nothing. */
  maxPairPasses: number;
  obstacleIterations: number;
  mass: { player: number; zombie: number };
  stopProjectilesAtObstacles: boolean;
}

type CandidatePair =
  | { sensor: false; a: DamageableEntity; b: DamageableEntity }
  | { sensor: true; a: Entity; b: Entity };

function isPickupContact(a: Entity, b: Entity): boolean {
  return (a.kind === "pickup" && b.kind === "player") || (a.kind === "player" && b.kind === "pickup");
}

/**
 * Per-tick collision detection and resolution.
 *
 * Phases run in a fixed order: entity-entity pushes, then obstacle clamping
 * (so static geometry wins whatever conflict is left), then swept projectile
 * tests. All per-tick structures are rebuilt from scratch by rebuild().
 */
export class CollisionWorld {
  readonly config: CollisionConfig;
  private readonly obstacles: ObstacleIndex;
  private readonly grid: SpatialHashGrid<Entity>;
  private entities: Entity[] = [];
  private tickEvents: CollisionEvent[] = [];

  constructor(obstacles: ObstacleIndex, overrides: Partial<CollisionConfig> = {}) {
    this.config = {
      cellSize: SIM.COLLISION.CELL_SIZE,
      epsilon: SIM.COLLISION.EPSILON,
      maxPairPasses: SIM.COLLISION.MAX_PAIR_PASSES,
      obstacleIterations: SIM.COLLISION.OBSTACLE_ITERATIONS,
      mass: { ...SIM.COLLISION.MASS },
      stopProjectilesAtObstacles: SIM.COLLISION.STOP_PROJECTILES_AT_OBSTACLES,
      ...overrides,
    };
    const cfg = this.config;
    if (!(cfg.cellSize > 0) || cfg.maxPairPasses < 1 || cfg.obstacleIterations < 1) {
      throw new SimulationInputError("Collision cell size and iteration counts must be positive");
    }
    if (!(cfg.mass.player > 0) || !(cfg.mass.zombie > 0)) {
      throw new SimulationInputError("Entity masses must be positive");
    }
    this.obstacles = obstacles;
    this.grid = new SpatialHashGrid<Entity>(cfg.cellSize);
  }

  get events(): readonly CollisionEvent[] {
    return this.tickEvents;
  }

  /** Collects every live entity, buckets them and clears last tick's events. */
  rebuild(entities: Iterable<Entity>): void {
    this.tickEvents = [];
    this.entities = [];
    for (const e of entities) {
      if (e.alive) this.entities.push(e);
    }
    this.entities.sort((a, b) => a.id - b.id);
    this.rebucket();
  }

  /** Re-buckets the collected entities at their current positions. */
  private rebucket(): void {
    this.grid.clear();
    // projectiles query the grid along their path but are never candidates themselves
    this.grid.insertAll(this.entities.filter((e) => e.alive && e.kind !== "projectile"));
  }

  /** Entities in the same or one of the 8 surrounding cells, excluding the entity itself. */
  queryNeighbors(entity: Entity): Entity[] {
    return this.grid.getNearby(entity.x, entity.y).filter((other) => other !== entity);
  }

  private candidatePairs(): CandidatePair[] {
    const pairs: CandidatePair[] = [];
    for (const a of this.entities) {
      if (a.kind === "projectile" || !a.alive) continue;
      for (const b of this.queryNeighbors(a)) {
        // each unordered pair once, from its lower id
        if (b.id <= a.id) continue;
        if (isDynamic(a) && isDynamic(b)) {
          pairs.push({ sensor: false, a, b });
        } else if (isPickupContact(a, b)) {
          pairs.push({ sensor: true, a, b });
        }
      }
    }
    pairs.sort((p, q) => p.a.id - q.a.id || p.b.id - q.b.id);
    return pairs;
  }

  /**
   * Pushes overlapping dynamic entities apart along the line between their
   * centres, split by mass. Each pass re-buckets the entities at their pushed
   * positions and visits the candidate pairs in (lower id, higher id) order;
   * passes repeat until one moves nothing or maxPairPasses is reached.
   */
  resolvePairs(): CollisionEvent[] {
    const { epsilon, maxPairPasses, mass } = this.config;
    const events: CollisionEvent[] = [];
    const reported = new Set<string>();
    let settled = false;

    for (let pass = 0; pass < maxPairPasses && !settled; pass++) {
      if (pass > 0) this.rebucket();
      let moved = false;
      for (const pair of this.candidatePairs()) {
        const { a, b } = pair;
        if (!a.alive || !b.alive) continue;

        const dx = b.x - a.x;
        const dy = b.y - a.y;
        const dist = length(dx, dy);
        const overlap = a.radius + b.radius - dist;
        if (overlap <= epsilon) continue;

        const n = dist > epsilon ? { x: dx / dist, y: dy / dist } : tieBreakDirection(a.id, b.id);
        const key = `${a.id}:${b.id}`;
        if (!reported.has(key)) {
          reported.add(key);
          events.push({
            kind: "entity-entity",
            entityA: a.id,
            entityB: b.id,
            penetration: { x: n.x * overlap, y: n.y * overlap },
          });
        }
        if (pair.sensor) continue;

        const ma = mass[pair.a.kind];
        const mb = mass[pair.b.kind];
        const shareA = mb / (ma + mb);
        const shareB = ma / (ma + mb);
        pair.a.x -= n.x * overlap * shareA;
        pair.a.y -= n.y * overlap * shareA;
        pair.b.x += n.x * overlap * shareB;
        pair.b.y += n.y * overlap * shareB;
        moved = true;
      }
      settled = !moved;
    }

    // projectile sweeps read the grid at the final positions
    if (!settled) this.rebucket();
    this.tickEvents.push(...events);
    return events;
  }

  /** Displacement that moves the entity out of the obstacle, or null when not penetrating. */
  private obstaclePush(e: DamageableEntity, o: Obstacle): Vec2 | null {
    const { epsilon } = this.config;

    if (o.kind === "circle") {
      const dx = e.x - o.x;
      const dy = e.y - o.y;
      const dist = length(dx, dy);
      const overlap = e.radius + o.radius - dist;
      if (overlap <= epsilon) return null;
      const n = dist > epsilon ? { x: dx / dist, y: dy / dist } : tieBreakDirection(e.id, o.id);
      return { x: n.x * overlap, y: n.y * overlap };
    }

    const q = closestPointOnBox(e.x, e.y, o);
    const dx = e.x - q.x;
    const dy = e.y - q.y;
    const dist = length(dx, dy);
    if (dist > epsilon) {
      const overlap = e.radius - dist;
      if (overlap <= epsilon) return null;
      return { x: (dx / dist) * overlap, y: (dy / dist) * overlap };
    }

    // Centre inside the box: leave through the nearest face.
    const exits: Vec2[] = [
      { x: -(e.x - o.minX + e.radius), y: 0 },
      { x: o.maxX - e.x + e.radius, y: 0 },
      { x: 0, y: -(e.y - o.minY + e.radius) },
      { x: 0, y: o.maxY - e.y + e.radius },
    ];
    let best = exits[0];
    for (const exit of exits) {
      if (Math.abs(exit.x) + Math.abs(exit.y) < Math.abs(best.x) + Math.abs(best.y)) best = exit;
    }
    return best;
  }

  /**
   * Clamps every dynamic entity out of the static obstacles it overlaps. Runs
   * after resolvePairs() so obstacles win any conflict left over from pushes.
   */
  resolveObstacles(): CollisionEvent[] {
    const { obstacleIterations } = this.config;
    const bounds = this.obstacles.bounds;
    const events: CollisionEvent[] = [];
    const reported = new Set<string>();

    for (const e of this.entities) {
      if (!isDynamic(e) || !e.alive) continue;

      if (bounds) {
        e.x = clamp(e.x, e.radius, bounds.width - e.radius);
        e.y = clamp(e.y, e.radius, bounds.height - e.radius);
      }

      for (let pass = 0; pass < obstacleIterations; pass++) {
        let pushed = false;
        for (const o of this.obstacles.near(e.x, e.y, e.radius)) {
          const push = this.obstaclePush(e, o);
          if (!push) continue;
          e.x += push.x;
          e.y += push.y;
          pushed = true;
          const key = `${e.id}:${o.id}`;
          if (!reported.has(key)) {
            reported.add(key);
            events.push({ kind: "entity-obstacle", entityA: e.id, entityB: o.id, penetration: push });
          }
        }
        if (!pushed) break;
      }
    }

    this.tickEvents.push(...events);
    return events;
  }

  /**
   * Sweeps each projectile along this tick's displacement and reports the
   * first damageable entity it touches. A hit spends the projectile; it does
   * not push the target.
   */
  testProjectiles(): CollisionEvent[] {
    const events: CollisionEvent[] = [];

    for (const p of this.entities) {
      if (p.kind !== "projectile" || !p.alive) continue;
      const sx = p.prevX;
      const sy = p.prevY;
      const ex = p.x;
      const ey = p.y;

      let hit: { target: DamageableEntity; t: number } | null = null;
      const candidates = this.grid.queryRect(
        Math.min(sx, ex) - p.radius, Math.min(sy, ey) - p.radius,
        Math.max(sx, ex) + p.radius, Math.max(sy, ey) + p.radius,
      );
      for (const c of candidates) {
        if (!isDamageable(c) || !c.alive || c.id === p.ownerId) continue;
        const t = segmentCircleTime(sx, sy, ex, ey, c.x, c.y, c.radius + p.radius);
        if (t === null) continue;
        if (!hit || t < hit.t || (t === hit.t && c.id < hit.target.id)) {
          hit = { target: c, t };
        }
      }

      if (this.config.stopProjectilesAtObstacles) {
        const wall = this.obstacles.firstHitAlong(sx, sy, ex, ey, p.radius);
        if (wall && (!hit || wall.t < hit.t)) {
          p.alive = false;
          events.push({
            kind: "entity-obstacle",
            entityA: p.id,
            entityB: wall.obstacle.id,
            penetration: remainingTravel(p, wall.t),
          });
          continue;
        }
      }

      if (hit) {
        p.alive = false;
        events.push({
          kind: "projectile-hit",
          entityA: p.id,
          entityB: hit.target.id,
          penetration: remainingTravel(p, hit.t),
        });
      }
    }

    this.tickEvents.push(...events);
    return events;
  }

  /** Runs a full collision pass and returns every event of the tick. */
  step(entities: Iterable<Entity>): readonly CollisionEvent[] {
    this.rebuild(entities);
    this.resolvePairs();
    this.resolveObstacles();
    this.testProjectiles();
    return this.tickEvents;
  }
}

/** The part of the tick's displacement beyond the point of contact. */
function remainingTravel(p: ProjectileEntity, t: number): Vec2 {
  return { x: (p.x - p.prevX) * (1 - t), y: (p.y - p.prevY) * (1 - t) };
}
