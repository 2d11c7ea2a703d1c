import type { Vec2 } from "../types/entity.js";

export interface Box {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function length(x: number, y: number): number {
  return Math.sqrt(x * x + y * y);
}

export function distance(a: Vec2, b: Vec2): number {
  return length(a.x - b.x, a.y - b.y);
}

/** Unit vector in the direction of v; the zero vector stays zero. */
export function normalize(v: Vec2): Vec2 {
  const len = length(v.x, v.y);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

export function rotate(v: Vec2, degrees: number): Vec2 {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return { x: v.x * cos - v.y * sin, y: v.x * sin + v.y * cos };
}

export function closestPointOnBox(x: number, y: number, box: Box): Vec2 {
  return { x: clamp(x, box.minX, box.maxX), y: clamp(y, box.minY, box.maxY) };
}

export function circleOverlapsCircle(
  ax: number, ay: number, ar: number,
  bx: number, by: number, br: number,
): boolean {
  const dx = bx - ax;
  const dy = by - ay;
  const r = ar + br;
  return dx * dx + dy * dy < r * r;
}

export function circleOverlapsBox(x: number, y: number, r: number, box: Box): boolean {
  const q = closestPointOnBox(x, y, box);
  const dx = x - q.x;
  const dy = y - q.y;
  return dx * dx + dy * dy < r * r;
}

/**
 * Earliest t in [0, 1] at which the segment s→e comes within r of (cx, cy).
 * Returns 0 when the segment starts inside, null when it never gets there.
 */
export function segmentCircleTime(
  sx: number, sy: number, ex: number, ey: number,
  cx: number, cy: number, r: number,
): number | null {
  const fx = sx - cx;
  const fy = sy - cy;
  const c = fx * fx + fy * fy - r * r;
  if (c <= 0) return 0;

  const dx = ex - sx;
  const dy = ey - sy;
  const a = dx * dx + dy * dy;
  if (a === 0) return null;

  const b = 2 * (fx * dx + fy * dy);
  const disc = b * b - 4 * a * c;
  if (disc < 0) return null;

  const t = (-b - Math.sqrt(disc)) / (2 * a);
  return t >= 0 && t <= 1 ? t : null;
}

/** Slab test of the segment s→e against the box grown by pad on every side. */
export function segmentBoxTime(
  sx: number, sy: number, ex: number, ey: number,
  box: Box, pad: number,
): number | null {
  const minX = box.minX - pad;
  const minY = box.minY - pad;
  const maxX = box.maxX + pad;
  const maxY = box.maxY + pad;
  if (sx > minX && sx < maxX && sy > minY && sy < maxY) return 0;

  let tMin = 0;
  let tMax = 1;
  const axes: Array<[number, number, number, number]> = [
    [sx, ex - sx, minX, maxX],
    [sy, ey - sy, minY, maxY],
  ];
  for (const [start, delta, lo, hi] of axes) {
    if (Math.abs(delta) < 1e-12) {
      if (start <= lo || start >= hi) return null;
      continue;
    }
    let t1 = (lo - start) / delta;
    let t2 = (hi - start) / delta;
    if (t1 > t2) [t1, t2] = [t2, t1];
    tMin = Math.max(tMin, t1);
    tMax = Math.min(tMax, t2);
    if (tMin > tMax) return null;
  }
  return tMin;
}

/**
 * Unit vector derived from an (ordered) id pair. Used to separate shapes whose
 * centres coincide, so the result does not depend on iteration order.
 */
export function tieBreakDirection(lo: number, hi: number): Vec2 {
  const h = (Math.imul(lo, 0x9e3779b1) ^ Math.imul(hi + 1, 0x85ebca6b)) >>> 0;
  const angle = (h / 0x100000000) * Math.PI * 2;
  return { x: Math.cos(angle), y: Math.sin(angle) };
}
