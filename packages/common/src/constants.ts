/**
 * Game constants shared between the simulation and the server
 */

// Field settings
export const FIELD_WIDTH = 1920;
export const FIELD_HEIGHT = 1080;
export const TARGET_FILL_PERCENTAGE = 75;

// Player settings
export const PLAYER_SPEED = 4; // units per step
export const PLAYER_RADIUS = 6;
export const TRACE_RECENT_POINTS = 5; // newest trace points a move may revisit

// Geometry tolerances
export const SIDE_TOLERANCE = 2;
export const BOUNDARY_INDEX_TOLERANCE = 1;
export const EDGE_TOLERANCE = 2;
export const TEST_POINT_OFFSET = 5;

// Enemy settings
export const ENEMY_SPEEDS = [-3, -2, 2, 3] as const;
export const ENEMY_DEFAULT_SIZE = 30;
export const ENEMY_BASE_SIZE = 25;
export const ENEMY_SIZE_JITTER = 5;

// Spatial hash cell for filled-polygon edges
export const EDGE_CELL_SIZE = 64;

// Server settings
export const SERVER_TICK_RATE = 60; // Hz
export const SERVER_TICK_INTERVAL = 1000 / SERVER_TICK_RATE; // ms
