import type { Enemy, Point } from './types.js';
import { EDGE_TOLERANCE } from './constants.js';
import type { BoundaryCurve } from './math/boundary.js';
import { pointToSegmentDistance } from './math/geometry.js';
import type { TerritorySet } from './Territory.js';

/**
 * Whether a point has entered captured territory (used to redirect enemies)
 */
export function isPointCaptured(point: Point, territory: TerritorySet): boolean {
  return territory.contains(point);
}

/**
 * Whether any segment of the trace passes closer than `enemyRadius` to the enemy
 */
export function isTraceNearEnemy(
  trace: readonly Point[],
  enemyCenter: Point,
  enemyRadius: number
): boolean {
  for (let i = 0; i < trace.length - 1; i++) {
    if (pointToSegmentDistance(enemyCenter, trace[i], trace[i + 1]) < enemyRadius) {
      return true;
    }
  }
  return false;
}

export function isPlayerTouchingEnemy(center: Point, radius: number, enemy: Enemy): boolean {
  return Math.hypot(center.x - enemy.x, center.y - enemy.y) < enemy.size + radius;
}

/**
 * Movement gate: the point is exactly on the rectangle curve, or within
 * `tolerance` of a captured polygon edge
 */
export function isPointOnBoundaryOrEdge(
  point: Point,
  boundary: BoundaryCurve,
  territory: TerritorySet,
  tolerance: number = EDGE_TOLERANCE
): boolean {
  return boundary.has(point) || territory.isNearEdge(point, tolerance);
}

/**
 * Captured share of the field in percent, clamped to [0, 100]
 */
export function queryCoveragePercentage(territory: TerritorySet, totalArea: number): number {
  if (!(totalArea > 0)) return 0;
  return Math.min(100, Math.max(0, (territory.filledArea / totalArea) * 100));
}
