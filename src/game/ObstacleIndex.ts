import { SIM } from "../config/game.constants.js";
import { ObstacleSchema, type Obstacle } from "../types/entity.js";
import { SimulationInputError } from "./errors.js";
import {
  circleOverlapsBox,
  circleOverlapsCircle,
  segmentBoxTime,
  segmentCircleTime,
  type Box,
} from "./geometry.js";

export interface WorldBounds {
  width: number;
  height: number;
}

export interface ObstacleIndexOptions {
  cellSize?: number;
  bounds?: WorldBounds | null;
}

export function obstacleBounds(o: Obstacle): Box {
  if (o.kind === "box") return o;
  return { minX: o.x - o.radius, minY: o.y - o.radius, maxX: o.x + o.radius, maxY: o.y + o.radius };
}

/**
 * Static map geometry, validated and bucketed once at level start and shared
 * read-only by collision, navigation and the director. Each obstacle is stored
 * in every cell its bounding box covers.
 */
export class ObstacleIndex {
  readonly obstacles: readonly Obstacle[];
  readonly bounds: WorldBounds | null;
  private readonly cellSize: number;
  private readonly cells = new Map<string, Obstacle[]>();

  constructor(obstacles: readonly Obstacle[], options: ObstacleIndexOptions = {}) {
    this.cellSize = options.cellSize ?? SIM.COLLISION.CELL_SIZE;
    if (!(this.cellSize > 0)) {
      throw new SimulationInputError(`Obstacle cell size must be positive, got ${this.cellSize}`);
    }
    this.bounds = options.bounds ?? null;

    const ids = new Set<number>();
    for (const o of obstacles) {
      const parsed = ObstacleSchema.safeParse(o);
      if (!parsed.success) {
        throw new SimulationInputError(`Invalid obstacle ${JSON.stringify(o)}: ${parsed.error.message}`);
      }
      if (ids.has(o.id)) {
        throw new SimulationInputError(`Duplicate obstacle id ${o.id}`);
      }
      ids.add(o.id);
    }

    this.obstacles = Object.freeze([...obstacles].sort((a, b) => a.id - b.id));
    for (const o of this.obstacles) {
      const b = obstacleBounds(o);
      this.forEachCell(b.minX, b.minY, b.maxX, b.maxY, (key) => {
        let cell = this.cells.get(key);
        if (!cell) {
          cell = [];
          this.cells.set(key, cell);
        }
        cell.push(o);
      });
    }
  }

  private forEachCell(
    minX: number, minY: number, maxX: number, maxY: number,
    fn: (key: string) => void,
  ): void {
    const cx0 = Math.floor(minX / this.cellSize);
    const cy0 = Math.floor(minY / this.cellSize);
    const cx1 = Math.floor(maxX / this.cellSize);
    const cy1 = Math.floor(maxY / this.cellSize);
    for (let cy = cy0; cy <= cy1; cy++) {
      for (let cx = cx0; cx <= cx1; cx++) {
        fn(`${cx},${cy}`);
      }
    }
  }

  /** Obstacles whose buckets touch the square around the circle, ordered by id. */
  near(x: number, y: number, radius: number): Obstacle[] {
    return this.inRect(x - radius, y - radius, x + radius, y + radius);
  }

  inRect(minX: number, minY: number, maxX: number, maxY: number): Obstacle[] {
    const found = new Map<number, Obstacle>();
    this.forEachCell(minX, minY, maxX, maxY, (key) => {
      const cell = this.cells.get(key);
      if (!cell) return;
      for (const o of cell) found.set(o.id, o);
    });
    return [...found.values()].sort((a, b) => a.id - b.id);
  }

  overlapsCircle(x: number, y: number, radius: number): boolean {
    for (const o of this.near(x, y, radius)) {
      if (o.kind === "circle") {
        if (circleOverlapsCircle(x, y, radius, o.x, o.y, o.radius)) return true;
      } else if (circleOverlapsBox(x, y, radius, o)) {
        return true;
      }
    }
    return false;
  }

  /** Whether a circle lies fully inside the world bounds (always true without bounds). */
  insideBounds(x: number, y: number, radius: number): boolean {
    if (!this.bounds) return true;
    return x - radius >= 0 && y - radius >= 0 &&
      x + radius <= this.bounds.width && y + radius <= this.bounds.height;
  }

  /** First obstacle the swept circle s→e touches, with the parametric time of contact. */
  firstHitAlong(
    sx: number, sy: number, ex: number, ey: number, radius: number,
  ): { obstacle: Obstacle; t: number } | null {
    const candidates = this.inRect(
      Math.min(sx, ex) - radius, Math.min(sy, ey) - radius,
      Math.max(sx, ex) + radius, Math.max(sy, ey) + radius,
    );
    let best: { obstacle: Obstacle; t: number } | null = null;
    for (const o of candidates) {
      const t = o.kind === "circle"
        ? segmentCircleTime(sx, sy, ex, ey, o.x, o.y, o.radius + radius)
        : segmentBoxTime(sx, sy, ex, ey, o, radius);
      if (t !== null && (best === null || t < best.t)) {
        best = { obstacle: o, t };
      }
    }
    return best;
  }
}
