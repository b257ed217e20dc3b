// Types
export { Direction } from './types.js';
export type {
  Point,
  Polygon,
  FieldSize,
  BoundarySide,
  ClosureResolution,
  ClosureResult,
  TraceStep,
  Enemy,
  GameStatus,
  GameEvent,
  GameConfig,
} from './types.js';

// Math/Geometry
export {
  isPointInPolygon,
  pointToSegmentDistance,
  getSignedPolygonArea,
  getPolygonArea,
  pointsEqual,
  closeRing,
  simplifyPolygon,
} from './math/geometry.js';
export { BoundaryCurve } from './math/boundary.js';
export { closeTrace } from './math/closure.js';

// Territory and queries
export { SpatialHash } from './SpatialHash.js';
export { TerritorySet } from './Territory.js';
export {
  isPointCaptured,
  isTraceNearEnemy,
  isPlayerTouchingEnemy,
  isPointOnBoundaryOrEdge,
  queryCoveragePercentage,
} from './collision.js';

// Simulation
export { nextDirection, directionVector, isDirection } from './direction.js';
export { createRng, nextFloat, nextInt, pick } from './rng.js';
export type { RngState } from './rng.js';
export { Player } from './Player.js';
export { Qix, createEnemies } from './Qix.js';
export { GameState, DEFAULT_GAME_CONFIG } from './GameState.js';

// Constants
export * from './constants.js';
