import type { ClosureResult, Point } from '../types.js';
import { TEST_POINT_OFFSET } from '../constants.js';
import type { BoundaryCurve } from './boundary.js';
import { closeRing, getPolygonArea, isPointInPolygon } from './geometry.js';

function containsPoint(segment: readonly Point[], target: Point): boolean {
  return segment.some((p) => Math.abs(p.x - target.x) < 1 && Math.abs(p.y - target.y) < 1);
}

/**
 * Offset `length` units from `origin` along (vx, vy); zero vector means no offset
 */
function offsetAlong(origin: Point, vx: number, vy: number, length: number): Point {
  const len = Math.hypot(vx, vy);
  if (len === 0) return { ...origin };
  return {
    x: origin.x + (vx / len) * length,
    y: origin.y + (vy / len) * length,
  };
}

/**
 * Seal a finished trace into a polygon using one arc of the boundary curve.
 *
 * The arc is picked by corner affinity (the corner between the two endpoint
 * sides) or, failing that, by length; that choice alone fixes the captured
 * region. With the arc running from trace start to trace end, both windings of
 * trace + arc enclose the same region, so the test point and the area
 * comparison only decide the winding and the reported resolution: the
 * trace-forward ring when the test point lands inside, otherwise the
 * trace-reversed one (equal areas go to it). Endpoints that cannot be located
 * on the curve fall back to closing the trace on itself.
 */
export function closeTrace(trace: readonly Point[], boundary: BoundaryCurve): ClosureResult {
  if (trace.length < 3) {
    throw new RangeError(`closeTrace needs at least 3 points, got ${trace.length}`);
  }

  const start = trace[0];
  const end = trace[trace.length - 1];

  const desiredCorner = boundary.cornerBetween(boundary.sideOf(start), boundary.sideOf(end));

  const startIndex = boundary.indexOf(start);
  const endIndex = boundary.indexOf(end);
  if (startIndex === null || endIndex === null) {
    console.warn(
      `⚠️ Trace endpoint off boundary (start=${startIndex}, end=${endIndex}), closing trace on itself`
    );
    return {
      polygon: [...trace, start],
      resolution: 'fallback',
      desiredCorner,
      testPoint: null,
    };
  }

  // startToEnd runs with the trace, endToStart is the rest of the loop
  const startToEnd = boundary.segmentBetween(startIndex, endIndex);
  const endToStart = boundary.segmentBetween(endIndex, startIndex);

  let useStartToEnd: boolean;
  if (desiredCorner) {
    useStartToEnd = containsPoint(startToEnd, desiredCorner);
  } else {
    useStartToEnd = startToEnd.length < endToStart.length;
  }

  // Chosen arc, oriented from the trace start to the trace end
  const arc = useStartToEnd ? startToEnd : [...endToStart].reverse();
  const reversedArc = [...arc].reverse();

  const candidateA = [...trace, ...reversedArc];
  const candidateB = [...trace].reverse().concat(arc);

  const mid = { x: (start.x + end.x) / 2, y: (start.y + end.y) / 2 };
  const testPoint = desiredCorner
    ? offsetAlong(mid, desiredCorner.x - mid.x, desiredCorner.y - mid.y, TEST_POINT_OFFSET)
    : offsetAlong(mid, end.y - start.y, start.x - end.x, TEST_POINT_OFFSET);

  if (isPointInPolygon(testPoint, candidateA)) {
    return { polygon: closeRing(candidateA), resolution: 'forward', desiredCorner, testPoint };
  }

  const areaA = getPolygonArea(closeRing(candidateA));
  const areaB = getPolygonArea(closeRing(candidateB));
  return {
    polygon: closeRing(areaA < areaB ? candidateA : candidateB),
    resolution: 'area',
    desiredCorner,
    testPoint,
  };
}
