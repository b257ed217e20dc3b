import { Schema, type, ArraySchema } from '@colyseus/schema';

/**
 * Player state synchronized to clients
 * Uses flat arrays for efficiency
 */
export class PlayerState extends Schema {
  @type('number') x: number = 0;
  @type('number') y: number = 0;
  @type('boolean') drawing: boolean = false;
  @type('string') direction: string = 'none';

  // Trace as flat array: [x1, y1, x2, y2, ...]
  @type(['number']) trace = new ArraySchema<number>();
}

export class EnemyState extends Schema {
  @type('number') x: number = 0;
  @type('number') y: number = 0;
  @type('number') size: number = 0;
}

/**
 * One captured polygon, simplified, as a flat array
 */
export class FilledAreaState extends Schema {
  @type(['number']) points = new ArraySchema<number>();
}

/**
 * Root game state
 */
export class GameRoomState extends Schema {
  @type('number') width: number = 0;
  @type('number') height: number = 0;
  @type('number') level: number = 1;
  @type('string') status: string = 'playing';
  @type('number') fillPercentage: number = 0;
  @type('number') targetFillPercentage: number = 0;
  @type(PlayerState) player = new PlayerState();
  @type([EnemyState]) enemies = new ArraySchema<EnemyState>();
  @type([FilledAreaState]) filledAreas = new ArraySchema<FilledAreaState>();
}
