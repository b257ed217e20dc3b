export interface Point {
  x: number;
  y: number;
}

/**
 * Ordered point list. Filled polygons repeat their first point at the end.
 */
export type Polygon = Point[];

export interface FieldSize {
  width: number;
  height: number;
}

export type BoundarySide = 'top' | 'right' | 'bottom' | 'left';

/**
 * Axis-locked movement direction of the player
 */
export enum Direction {
  None = 'none',
  Up = 'up',
  Down = 'down',
  Left = 'left',
  Right = 'right',
}

/**
 * How the closure algorithm picked its final polygon
 * - forward: test point inside, trace-forward winding taken
 * - area: test point outside, area comparison settles the winding
 * - fallback: an endpoint was off the boundary curve
 */
export type ClosureResolution = 'forward' | 'area' | 'fallback';

export interface ClosureResult {
  polygon: Polygon;
  resolution: ClosureResolution;
  desiredCorner: Point | null;
  /** Null for the fallback closure */
  testPoint: Point | null;
}

export type TraceStep =
  | { kind: 'continuing' }
  | { kind: 'rejected' }
  | { kind: 'closed'; closure: ClosureResult; captured: boolean };

export interface Enemy {
  x: number;
  y: number;
  dx: number;
  dy: number;
  size: number;
}

export type GameStatus = 'playing' | 'won' | 'lost';

export type GameEvent =
  | { type: 'captured'; area: number; fillPercentage: number; resolution: ClosureResolution }
  | { type: 'collision' }
  | { type: 'won'; fillPercentage: number };

export interface GameConfig extends FieldSize {
  targetFillPercentage: number;
  playerSpeed: number;
  seed: number;
}
