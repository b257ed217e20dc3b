import type { Point } from './types.js';
import { EDGE_CELL_SIZE } from './constants.js';
import { getPolygonArea, isPointInPolygon, pointToSegmentDistance } from './math/geometry.js';
import { SpatialHash } from './SpatialHash.js';

interface Edge {
  p1: Point;
  p2: Point;
}

/**
 * Captured polygons of the current round, in capture order
 */
export class TerritorySet {
  private readonly filled: Point[][] = [];
  private edges: SpatialHash<Edge> = new SpatialHash(EDGE_CELL_SIZE);
  private area = 0;

  /**
   * Append a closed polygon. Degenerate polygons (fewer than 3 points,
   * non-finite coordinates, zero area) are rejected and leave the set as is.
   */
  add(polygon: readonly Point[]): boolean {
    const isValid = polygon.every((p) => Number.isFinite(p.x) && Number.isFinite(p.y));
    const area = polygon.length < 3 ? 0 : getPolygonArea(polygon);

    if (!isValid || !(area > 0)) {
      console.warn(`⚠️ Capture rejected: area ${area}, ${polygon.length} points`);
      return false;
    }

    const frozen = polygon.map((p) => ({ x: p.x, y: p.y }));
    this.filled.push(frozen);
    this.area += area;

    for (let i = 0; i < frozen.length - 1; i++) {
      const edge = { p1: frozen[i], p2: frozen[i + 1] };
      this.edges.insertSegment(edge, edge.p1, edge.p2);
    }
    return true;
  }

  get polygons(): readonly (readonly Point[])[] {
    return this.filled;
  }

  get size(): number {
    return this.filled.length;
  }

  /**
   * Sum of polygon areas (overlaps are counted twice)
   */
  get filledArea(): number {
    return this.area;
  }

  clear(): void {
    this.filled.length = 0;
    this.edges.clear();
    this.area = 0;
  }

  /**
   * True when the point is inside any captured polygon
   */
  contains(point: Point): boolean {
    return this.filled.some((polygon) => isPointInPolygon(point, polygon));
  }

  /**
   * True when the point lies within `tolerance` of a captured polygon edge.
   * Tolerances up to the hash cell size are exact.
   */
  isNearEdge(point: Point, tolerance: number): boolean {
    return this.edges
      .query(point.x, point.y)
      .some((edge) => pointToSegmentDistance(point, edge.p1, edge.p2) <= tolerance);
  }
}
