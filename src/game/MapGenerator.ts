import { SIM } from "../config/game.constants.js";
import type { Obstacle, Vec2 } from "../types/entity.js";
import { circleOverlapsBox, type Box } from "./geometry.js";
import { obstacleBounds } from "./ObstacleIndex.js";
import { Rng } from "./Rng.js";

export interface MapGenOptions {
  width: number;
  height: number;
  seed: number;
  count: number;
  /** Player start; no obstacle comes within clearRadius of it. */
  start: Vec2;
  clearRadius: number;
  gap: number;
  edgeMargin: number;
}

function defaultOptions(seed: number): MapGenOptions {
  return {
    width: SIM.MAP_WIDTH,
    height: SIM.MAP_HEIGHT,
    seed,
    count: SIM.OBSTACLES.COUNT,
    start: { x: SIM.MAP_WIDTH / 2, y: SIM.MAP_HEIGHT / 2 },
    clearRadius: SIM.PLAYER.START_CLEAR_RADIUS,
    gap: SIM.OBSTACLES.GAP,
    edgeMargin: SIM.OBSTACLES.EDGE_MARGIN,
  };
}

// ─── Shapes ───

function randomCircle(rng: Rng, id: number, opts: MapGenOptions): Obstacle {
  const { min, max } = SIM.OBSTACLES.CIRCLE_RADIUS;
  const radius = rng.int(min, max);
  const lo = opts.edgeMargin + radius;
  return {
    kind: "circle",
    id,
    x: rng.range(lo, opts.width - lo),
    y: rng.range(lo, opts.height - lo),
    radius,
  };
}

function randomBox(rng: Rng, id: number, opts: MapGenOptions): Obstacle {
  const { min, max } = SIM.OBSTACLES.BOX_SIZE;
  const w = rng.int(min, max);
  const h = rng.int(min, max);
  const minX = rng.range(opts.edgeMargin, opts.width - opts.edgeMargin - w);
  const minY = rng.range(opts.edgeMargin, opts.height - opts.edgeMargin - h);
  return { kind: "box", id, minX, minY, maxX: minX + w, maxY: minY + h };
}

// ─── Placement ───

function padded(b: Box, pad: number): Box {
  return { minX: b.minX - pad, minY: b.minY - pad, maxX: b.maxX + pad, maxY: b.maxY + pad };
}

function boxesOverlap(a: Box, b: Box): boolean {
  return a.minX < b.maxX && b.minX < a.maxX && a.minY < b.maxY && b.minY < a.maxY;
}

/**
 * Scatters static obstacles over the map. Placement is tested on bounding
 * boxes, so two obstacles are always at least `gap` apart and none reaches
 * into the clear zone around the start. An obstacle that finds no free spot
 * within the attempt budget is left out, so fewer than `count` may be returned.
 */
export function generateObstacles(seed: number, overrides: Partial<MapGenOptions> = {}): Obstacle[] {
  const opts: MapGenOptions = { ...defaultOptions(seed), ...overrides };
  const rng = new Rng(opts.seed);
  const placed: Obstacle[] = [];
  const footprints: Box[] = [];

  for (let n = 0; n < opts.count; n++) {
    const id = placed.length + 1;
    for (let attempt = 0; attempt < SIM.OBSTACLES.MAX_ATTEMPTS; attempt++) {
      const candidate = rng.next() < SIM.OBSTACLES.CIRCLE_SHARE
        ? randomCircle(rng, id, opts)
        : randomBox(rng, id, opts);
      const footprint = obstacleBounds(candidate);

      if (circleOverlapsBox(opts.start.x, opts.start.y, opts.clearRadius, footprint)) continue;
      const grown = padded(footprint, opts.gap);
      if (footprints.some((f) => boxesOverlap(grown, f))) continue;

      placed.push(candidate);
      footprints.push(footprint);
      break;
    }
  }

  return placed;
}

/** Map centre, where the player starts. */
export function getPlayerStart(width: number = SIM.MAP_WIDTH, height: number = SIM.MAP_HEIGHT): Vec2 {
  return { x: width / 2, y: height / 2 };
}
