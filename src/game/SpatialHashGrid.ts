/**
 * Uniform spatial hash grid for broad-phase collision queries.
 *
 * Entities are bucketed by floor(position / cellSize) and the grid is rebuilt
 * from scratch every tick. A query returns the contents of the cell under the
 * point plus its 8 neighbours, so with cellSize >= the largest entity diameter
 * no overlapping pair is ever missed, including pairs straddling a cell edge.
 */

export interface SpatialEntity {
  x: number;
  y: number;
}

// Stride for the y cell coordinate; the 9 keys around any cell are distinct.
const ROW_STRIDE = 10007;

export class SpatialHashGrid<T extends SpatialEntity> {
  readonly cellSize: number;
  private cells = new Map<number, T[]>();
  private count = 0;

  constructor(cellSize: number) {
    this.cellSize = cellSize;
  }

  cellOf(x: number, y: number): { cx: number; cy: number } {
    return { cx: Math.floor(x / this.cellSize), cy: Math.floor(y / this.cellSize) };
  }

  private key(cx: number, cy: number): number {
    return cx + cy * ROW_STRIDE;
  }

  clear(): void {
    this.cells.clear();
    this.count = 0;
  }

  insert(entity: T): void {
    const { cx, cy } = this.cellOf(entity.x, entity.y);
    const key = this.key(cx, cy);
    let cell = this.cells.get(key);
    if (!cell) {
      cell = [];
      this.cells.set(key, cell);
    }
    cell.push(entity);
    this.count++;
  }

  insertAll(entities: Iterable<T>): void {
    for (const entity of entities) {
      this.insert(entity);
    }
  }

  /** Entities in the 3x3 block of cells centred on the cell containing (x, y). */
  getNearby(x: number, y: number): T[] {
    const { cx, cy } = this.cellOf(x, y);
    return this.collect(cx - 1, cy - 1, cx + 1, cy + 1);
  }

  /** Entities in every cell touching the rectangle, plus a one-cell margin. */
  queryRect(minX: number, minY: number, maxX: number, maxY: number): T[] {
    const lo = this.cellOf(minX, minY);
    const hi = this.cellOf(maxX, maxY);
    return this.collect(lo.cx - 1, lo.cy - 1, hi.cx + 1, hi.cy + 1);
  }

  private collect(cx0: number, cy0: number, cx1: number, cy1: number): T[] {
    const result: T[] = [];
    // Different cells far apart can share a hash key; never report an entity twice.
    const seen = new Set<number>();
    for (let cy = cy0; cy <= cy1; cy++) {
      for (let cx = cx0; cx <= cx1; cx++) {
        const key = this.key(cx, cy);
        if (seen.has(key)) continue;
        seen.add(key);
        const cell = this.cells.get(key);
        if (cell) {
          for (const entity of cell) {
            result.push(entity);
          }
        }
      }
    }
    return result;
  }

  get entityCount(): number {
    return this.count;
  }
}
