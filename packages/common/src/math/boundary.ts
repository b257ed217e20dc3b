import type { BoundarySide, FieldSize, Point } from '../types.js';
import { BOUNDARY_INDEX_TOLERANCE, SIDE_TOLERANCE } from '../constants.js';

/**
 * The field rectangle as a circular, indexable curve with one point per unit.
 * Traversal: top left→right, right top→bottom, bottom right→left,
 * left bottom→top. Corners appear once.
 *
 * Instances never change. Captured polygon edges are not part of the curve;
 * they are queried separately through the territory set.
 */
export class BoundaryCurve {
  readonly width: number;
  readonly height: number;
  readonly points: readonly Point[];
  private readonly lookup: Map<string, number> = new Map();

  constructor(field: FieldSize) {
    const { width, height } = field;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 2 || height < 2) {
      throw new RangeError(`Invalid field size ${width}x${height}`);
    }

    this.width = width;
    this.height = height;
    this.points = BoundaryCurve.generate(width, height);

    this.points.forEach((p, i) => {
      this.lookup.set(BoundaryCurve.key(p), i);
    });
  }

  static generate(width: number, height: number): Point[] {
    const boundary: Point[] = [];
    // Top
    for (let x = 0; x < width; x++) {
      boundary.push({ x, y: 0 });
    }
    // Right
    for (let y = 1; y < height; y++) {
      boundary.push({ x: width - 1, y });
    }
    // Bottom
    for (let x = width - 2; x >= 0; x--) {
      boundary.push({ x, y: height - 1 });
    }
    // Left
    for (let y = height - 2; y > 0; y--) {
      boundary.push({ x: 0, y });
    }
    return boundary;
  }

  private static key(point: Point): string {
    return `${point.x},${point.y}`;
  }

  get length(): number {
    return this.points.length;
  }

  get corners(): Record<'topLeft' | 'topRight' | 'bottomRight' | 'bottomLeft', Point> {
    const right = this.width - 1;
    const bottom = this.height - 1;
    return {
      topLeft: { x: 0, y: 0 },
      topRight: { x: right, y: 0 },
      bottomRight: { x: right, y: bottom },
      bottomLeft: { x: 0, y: bottom },
    };
  }

  /**
   * Exact membership
   */
  has(point: Point): boolean {
    return this.lookup.has(BoundaryCurve.key(point));
  }

  /**
   * First index whose point lies within `tolerance` of `point` on both axes.
   * A trace endpoint can sit off the discretised curve, so null is a normal answer.
   */
  indexOf(point: Point, tolerance: number = BOUNDARY_INDEX_TOLERANCE): number | null {
    for (let i = 0; i < this.points.length; i++) {
      const bp = this.points[i];
      if (Math.abs(bp.x - point.x) < tolerance && Math.abs(bp.y - point.y) < tolerance) {
        return i;
      }
    }
    return null;
  }

  /**
   * Inclusive circular slice from startIndex to endIndex, wrapping past the
   * end of the curve when startIndex > endIndex
   */
  segmentBetween(startIndex: number, endIndex: number): Point[] {
    if (startIndex <= endIndex) {
      return this.points.slice(startIndex, endIndex + 1);
    }
    return [...this.points.slice(startIndex), ...this.points.slice(0, endIndex + 1)];
  }

  /**
   * Which rectangle side a point sits on, checked top, right, bottom, left
   */
  sideOf(point: Point, tolerance: number = SIDE_TOLERANCE): BoundarySide | null {
    if (Math.abs(point.y) < tolerance) return 'top';
    if (Math.abs(point.x - (this.width - 1)) < tolerance) return 'right';
    if (Math.abs(point.y - (this.height - 1)) < tolerance) return 'bottom';
    if (Math.abs(point.x) < tolerance) return 'left';
    return null;
  }

  /**
   * Corner shared by two adjacent sides
   */
  cornerBetween(a: BoundarySide | null, b: BoundarySide | null): Point | null {
    if (a === null || b === null || a === b) return null;

    const pair = new Set<BoundarySide>([a, b]);
    const { topLeft, topRight, bottomRight, bottomLeft } = this.corners;

    if (pair.has('top') && pair.has('left')) return topLeft;
    if (pair.has('top') && pair.has('right')) return topRight;
    if (pair.has('bottom') && pair.has('right')) return bottomRight;
    if (pair.has('bottom') && pair.has('left')) return bottomLeft;
    return null;
  }
}
