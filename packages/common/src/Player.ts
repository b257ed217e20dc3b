import { Direction, type FieldSize, type Point, type TraceStep } from './types.js';
import { PLAYER_RADIUS, PLAYER_SPEED, TRACE_RECENT_POINTS } from './constants.js';
import { BoundaryCurve } from './math/boundary.js';
import { closeTrace } from './math/closure.js';
import { pointsEqual } from './math/geometry.js';
import { isPointOnBoundaryOrEdge } from './collision.js';
import { directionVector, nextDirection } from './direction.js';
import { TerritorySet } from './Territory.js';

/**
 * The player and everything it owns: position, in-progress trace,
 * captured territory and the boundary curve traces are closed against.
 */
export class Player {
  x: number = 0;
  y: number = 0;
  readonly speed: number;
  readonly radius: number = PLAYER_RADIUS;

  drawing: boolean = false;
  trace: Point[] = [];
  direction: Direction = Direction.None;

  readonly territory: TerritorySet = new TerritorySet();
  boundary: BoundaryCurve;

  private readonly field: FieldSize;

  constructor(field: FieldSize, speed: number = PLAYER_SPEED) {
    // Positions must stay on the unit grid the boundary curve is keyed on
    if (!Number.isInteger(speed) || speed <= 0) {
      throw new RangeError(`Player speed must be a positive integer, got ${speed}`);
    }
    this.field = { width: field.width, height: field.height };
    this.speed = speed;
    this.boundary = new BoundaryCurve(this.field);
  }

  get position(): Point {
    return { x: this.x, y: this.y };
  }

  /**
   * Rectangle curve or any captured polygon edge
   */
  isOnBoundary(point: Point): boolean {
    return isPointOnBoundaryOrEdge(point, this.boundary, this.territory);
  }

  private isInsideField(point: Point): boolean {
    return (
      point.x >= 0 &&
      point.y >= 0 &&
      point.x <= this.field.width - 1 &&
      point.y <= this.field.height - 1
    );
  }

  /**
   * Whether the player may step from `current` to `candidate`
   */
  isMovementValid(current: Point, candidate: Point): boolean {
    if (!this.isInsideField(candidate)) return false;
    if (this.isOnBoundary(candidate)) return true;
    if (!this.drawing) return false;

    // Traces are built from orthogonal steps only
    if (candidate.x !== current.x && candidate.y !== current.y) return false;

    if (this.territory.contains(candidate)) return false;

    // Crossing the trace is not allowed; the newest points are exempt for turns
    const checked = this.trace.length - TRACE_RECENT_POINTS;
    for (let i = 0; i < checked; i++) {
      if (pointsEqual(this.trace[i], candidate)) return false;
    }
    return true;
  }

  startTrace(point: Point = this.position): boolean {
    if (this.drawing || !this.isOnBoundary(point)) return false;

    this.x = point.x;
    this.y = point.y;
    this.drawing = true;
    this.trace = [{ x: point.x, y: point.y }];
    this.direction = Direction.None;
    return true;
  }

  /**
   * Move the drawing player to `point`. Touching the boundary again (anywhere
   * but the trace start) seals the trace into territory on the spot.
   */
  extendTrace(point: Point): TraceStep {
    if (!this.drawing || !this.isMovementValid(this.position, point)) {
      return { kind: 'rejected' };
    }

    this.x = point.x;
    this.y = point.y;
    this.trace.push({ x: point.x, y: point.y });

    if (this.trace.length >= 3 && !pointsEqual(point, this.trace[0]) && this.isOnBoundary(point)) {
      return this.finishTrace();
    }
    return { kind: 'continuing' };
  }

  private finishTrace(): TraceStep {
    const closure = closeTrace(this.trace, this.boundary);
    const captured = this.territory.add(closure.polygon);

    this.drawing = false;
    this.trace = [];
    this.direction = Direction.None;
    this.boundary = new BoundaryCurve(this.field);

    return { kind: 'closed', closure, captured };
  }

  abortTrace(): void {
    this.drawing = false;
    this.trace = [];
    this.direction = Direction.None;
  }

  /**
   * One step of movement. Steps are clamped to the field rectangle.
   * Returns the trace outcome while drawing, null otherwise or when idle.
   */
  move(intent: Direction): TraceStep | null {
    if (this.drawing) {
      this.direction = nextDirection(this.direction, intent);
      const { dx, dy } = directionVector(this.direction);
      if (dx === 0 && dy === 0) return null;

      const next = this.stepTowards(dx, dy);
      // Pressed against the field edge
      if (pointsEqual(next, this.position)) return { kind: 'rejected' };
      return this.extendTrace(next);
    }

    const { dx, dy } = directionVector(intent);
    if (dx === 0 && dy === 0) return null;

    const candidate = this.stepTowards(dx, dy);
    if (this.isMovementValid(this.position, candidate)) {
      this.x = candidate.x;
      this.y = candidate.y;
    }
    return null;
  }

  private stepTowards(dx: number, dy: number): Point {
    return {
      x: Math.min(this.field.width - 1, Math.max(0, this.x + dx * this.speed)),
      y: Math.min(this.field.height - 1, Math.max(0, this.y + dy * this.speed)),
    };
  }

  reset(): void {
    this.x = 0;
    this.y = 0;
    this.abortTrace();
    this.territory.clear();
    this.boundary = new BoundaryCurve(this.field);
  }
}
