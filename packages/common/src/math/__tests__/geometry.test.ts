import { describe, it, expect } from 'vitest';
import {
  isPointInPolygon,
  pointToSegmentDistance,
  getSignedPolygonArea,
  getPolygonArea,
  closeRing,
  simplifyPolygon,
} from '../geometry.js';
import type { Point } from '../../types.js';

const square: Point[] = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 },
];

describe('isPointInPolygon', () => {
  it('finds a point inside a square', () => {
    expect(isPointInPolygon({ x: 5, y: 5 }, square)).toBe(true);
  });

  it('rejects points left and right of a square', () => {
    expect(isPointInPolygon({ x: 15, y: 5 }, square)).toBe(false);
    expect(isPointInPolygon({ x: -1, y: 5 }, square)).toBe(false);
  });

  it('gives the same answer when the ring repeats its first point', () => {
    const closed = [...square, square[0]];
    expect(isPointInPolygon({ x: 5, y: 5 }, closed)).toBe(true);
    expect(isPointInPolygon({ x: 12, y: 5 }, closed)).toBe(false);
  });

  it('ignores a horizontal edge level with the ray', () => {
    // Step shape: 10x10 block plus a 10x5 block on its lower right
    const step: Point[] = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 5 },
      { x: 20, y: 5 },
      { x: 20, y: 10 },
      { x: 0, y: 10 },
    ];
    expect(isPointInPolygon({ x: 5, y: 5 }, step)).toBe(true);
    expect(isPointInPolygon({ x: 15, y: 7 }, step)).toBe(true);
    expect(isPointInPolygon({ x: 15, y: 2 }, step)).toBe(false);
  });

  it('handles concave polygons', () => {
    // U shape opening upwards
    const u: Point[] = [
      { x: 0, y: 0 },
      { x: 3, y: 0 },
      { x: 3, y: 7 },
      { x: 7, y: 7 },
      { x: 7, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ];
    expect(isPointInPolygon({ x: 1, y: 5 }, u)).toBe(true);
    expect(isPointInPolygon({ x: 5, y: 3 }, u)).toBe(false);
    expect(isPointInPolygon({ x: 5, y: 9 }, u)).toBe(true);
  });

  it('treats fewer than 3 points as empty', () => {
    expect(isPointInPolygon({ x: 0, y: 0 }, [])).toBe(false);
    expect(isPointInPolygon({ x: 1, y: 0 }, [{ x: 0, y: 0 }, { x: 2, y: 0 }])).toBe(false);
  });

  it('contains every interior blend of a convex hexagon and nothing beyond its box', () => {
    const hexagon: Point[] = Array.from({ length: 6 }, (_, i) => ({
      x: 50 + 40 * Math.cos((Math.PI / 3) * i),
      y: 50 + 40 * Math.sin((Math.PI / 3) * i),
    }));
    const center = { x: 50, y: 50 };

    for (const vertex of hexagon) {
      for (const t of [0.1, 0.5, 0.9]) {
        const inside = {
          x: center.x + (vertex.x - center.x) * t,
          y: center.y + (vertex.y - center.y) * t,
        };
        expect(isPointInPolygon(inside, hexagon)).toBe(true);
      }
    }

    for (const outside of [
      { x: 5, y: 50 },
      { x: 95, y: 50 },
      { x: 50, y: 5 },
      { x: 50, y: 95 },
      { x: -100, y: -100 },
    ]) {
      expect(isPointInPolygon(outside, hexagon)).toBe(false);
    }
  });
});

describe('pointToSegmentDistance', () => {
  it('measures perpendicular distance to the segment interior', () => {
    expect(pointToSegmentDistance({ x: 5, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBeCloseTo(3, 10);
  });

  it('clamps to the end point beyond the segment', () => {
    expect(pointToSegmentDistance({ x: 15, y: 0 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBeCloseTo(5, 10);
  });

  it('clamps to the start point before the segment', () => {
    expect(pointToSegmentDistance({ x: -3, y: 4 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBeCloseTo(5, 10);
  });

  it('projects onto diagonal segments', () => {
    expect(pointToSegmentDistance({ x: 0, y: 10 }, { x: 0, y: 0 }, { x: 10, y: 10 })).toBeCloseTo(
      Math.sqrt(50),
      10
    );
  });

  it('uses point distance for a zero-length segment', () => {
    const a = { x: 1, y: 1 };
    expect(pointToSegmentDistance({ x: 4, y: 5 }, a, a)).toBe(5);
  });
});

describe('getPolygonArea', () => {
  it('gives 1 for the closed unit square', () => {
    const unit = [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 0, y: 1 },
      { x: 0, y: 0 },
    ];
    expect(getPolygonArea(unit)).toBe(1);
  });

  it('does not wrap the last pair around', () => {
    const open = [
      { x: 1, y: 0 },
      { x: 2, y: 2 },
      { x: 0, y: 2 },
    ];
    expect(getPolygonArea(open)).toBe(3);
    expect(getPolygonArea(closeRing(open))).toBe(2);
  });

  it('signs the area by winding', () => {
    const clockwise = closeRing(square);
    expect(getSignedPolygonArea(clockwise)).toBe(100);
    expect(getSignedPolygonArea([...clockwise].reverse())).toBe(-100);
  });
});

describe('closeRing', () => {
  it('repeats the first point', () => {
    const ring = closeRing(square);
    expect(ring).toHaveLength(5);
    expect(ring[4]).toEqual({ x: 0, y: 0 });
  });

  it('leaves a closed ring alone', () => {
    expect(closeRing([...square, { x: 0, y: 0 }])).toHaveLength(5);
  });

  it('returns an empty ring for no points', () => {
    expect(closeRing([])).toEqual([]);
  });
});

describe('simplifyPolygon', () => {
  it('keeps only the corners of a densely sampled square', () => {
    const dense = [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 1 },
      { x: 2, y: 2 },
      { x: 1, y: 2 },
      { x: 0, y: 2 },
      { x: 0, y: 1 },
      { x: 0, y: 0 },
    ];
    expect(simplifyPolygon(dense)).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 2 },
      { x: 0, y: 2 },
      { x: 0, y: 0 },
    ]);
  });

  it('drops repeated vertices and preserves area', () => {
    const ring = [
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 4, y: 0 },
      { x: 4, y: 3 },
      { x: 2, y: 3 },
      { x: 0, y: 3 },
      { x: 0, y: 0 },
    ];
    const simplified = simplifyPolygon(ring);
    expect(simplified).toHaveLength(5);
    expect(getPolygonArea(simplified)).toBe(getPolygonArea(ring));
  });

  it('keeps a turn-back vertex', () => {
    const spike = [
      { x: 0, y: 0 },
      { x: 5, y: 0 },
      { x: 3, y: 0 },
      { x: 3, y: 4 },
      { x: 0, y: 0 },
    ];
    expect(simplifyPolygon(spike)).toEqual(spike);
  });
});
