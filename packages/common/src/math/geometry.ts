import type { Point } from '../types.js';

/**
 * Point-in-polygon test using ray casting towards +x
 * The polygon is walked circularly, so a repeated closing point is harmless.
 * Horizontal edges never change the crossing count.
 */
export function isPointInPolygon(point: Point, polygon: readonly Point[]): boolean {
  const n = polygon.length;
  if (n < 3) return false;

  let inside = false;
  let p1 = polygon[0];
  for (let i = 1; i <= n; i++) {
    const p2 = polygon[i % n];

    if (
      p1.y !== p2.y &&
      point.y > Math.min(p1.y, p2.y) &&
      point.y <= Math.max(p1.y, p2.y) &&
      point.x <= Math.max(p1.x, p2.x)
    ) {
      const xinters = ((point.y - p1.y) * (p2.x - p1.x)) / (p2.y - p1.y) + p1.x;
      if (p1.x === p2.x || point.x <= xinters) {
        inside = !inside;
      }
    }

    p1 = p2;
  }
  return inside;
}

/**
 * Distance from a point to the segment a-b
 * The projection is clamped to the segment; a zero-length segment
 * degrades to the distance to a.
 */
export function pointToSegmentDistance(point: Point, a: Point, b: Point): number {
  const px = point.x - a.x;
  const py = point.y - a.y;
  const sx = b.x - a.x;
  const sy = b.y - a.y;

  const lenSq = sx * sx + sy * sy;
  if (lenSq === 0) {
    return Math.sqrt(px * px + py * py);
  }

  const t = Math.max(0, Math.min(1, (px * sx + py * sy) / lenSq));
  const dx = point.x - (a.x + t * sx);
  const dy = point.y - (a.y + t * sy);
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Signed shoelace area over consecutive vertex pairs
 * The last-to-first pair is NOT added: pass a closed ring.
 * Positive = Clockwise (in screen coords where Y is down)
 */
export function getSignedPolygonArea(polygon: readonly Point[]): number {
  let area = 0;
  for (let i = 0; i < polygon.length - 1; i++) {
    area += polygon[i].x * polygon[i + 1].y;
    area -= polygon[i + 1].x * polygon[i].y;
  }
  return area / 2;
}

/**
 * Calculate polygon area (absolute value)
 */
export function getPolygonArea(polygon: readonly Point[]): number {
  return Math.abs(getSignedPolygonArea(polygon));
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Repeat the first point at the end unless the ring already closes itself
 */
export function closeRing(polygon: readonly Point[]): Point[] {
  if (polygon.length === 0) return [];
  const first = polygon[0];
  const last = polygon[polygon.length - 1];
  return pointsEqual(first, last) ? [...polygon] : [...polygon, first];
}

/**
 * Drop duplicate vertices and vertices lying on a straight run between
 * their neighbours. Area is preserved exactly; the ring endpoints are kept.
 * Polygons built from the boundary curve carry one vertex per unit, this
 * shrinks them before they go over the network.
 */
export function simplifyPolygon(polygon: readonly Point[]): Point[] {
  if (polygon.length < 3) return [...polygon];

  const simplified: Point[] = [polygon[0]];

  for (let i = 1; i < polygon.length - 1; i++) {
    const last = simplified[simplified.length - 1];
    const curr = polygon[i];
    const next = polygon[i + 1];

    if (pointsEqual(last, curr)) continue;

    const ax = curr.x - last.x;
    const ay = curr.y - last.y;
    const bx = next.x - curr.x;
    const by = next.y - curr.y;
    const cross = ax * by - ay * bx;
    const dot = ax * bx + ay * by;

    // Straight continuation: curr adds nothing to the outline
    if (cross === 0 && dot > 0) continue;

    simplified.push(curr);
  }

  const end = polygon[polygon.length - 1];
  if (!pointsEqual(simplified[simplified.length - 1], end) || simplified.length === 1) {
    simplified.push(end);
  }

  return simplified;
}
