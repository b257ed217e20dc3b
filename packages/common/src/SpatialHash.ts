import type { Point } from './types.js';

/**
 * Spatial hash for edge proximity queries
 * A query returns everything in the 3x3 block of cells around a position,
 * so any item within one cell size of the position is found.
 */
export class SpatialHash<T> {
  private cellSize: number;
  private buckets: Map<string, T[]> = new Map();

  constructor(cellSize: number = 100) {
    if (!(cellSize > 0)) {
      throw new RangeError(`Cell size must be positive, got ${cellSize}`);
    }
    this.cellSize = cellSize;
  }

  /**
   * Clear all buckets
   */
  clear(): void {
    this.buckets.clear();
  }

  private cell(value: number): number {
    return Math.floor(value / this.cellSize);
  }

  private add(cx: number, cy: number, obj: T): void {
    const key = `${cx},${cy}`;
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.push(obj);
    } else {
      this.buckets.set(key, [obj]);
    }
  }

  /**
   * Insert a line segment into every cell of its bounding box
   */
  insertSegment(obj: T, p1: Point, p2: Point): void {
    const minX = this.cell(Math.min(p1.x, p2.x));
    const maxX = this.cell(Math.max(p1.x, p2.x));
    const minY = this.cell(Math.min(p1.y, p2.y));
    const maxY = this.cell(Math.max(p1.y, p2.y));

    for (let cx = minX; cx <= maxX; cx++) {
      for (let cy = minY; cy <= maxY; cy++) {
        this.add(cx, cy, obj);
      }
    }
  }

  /**
   * Query objects near a position (includes 9 cells: current + 8 neighbors)
   * Each object is reported once even when it spans several cells.
   */
  query(x: number, y: number): T[] {
    const results = new Set<T>();
    const cx = this.cell(x);
    const cy = this.cell(y);

    for (let i = -1; i <= 1; i++) {
      for (let j = -1; j <= 1; j++) {
        const bucket = this.buckets.get(`${cx + i},${cy + j}`);
        if (bucket) {
          for (const obj of bucket) results.add(obj);
        }
      }
    }

    return [...results];
  }
}
