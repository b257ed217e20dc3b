import { Direction, type GameConfig, type GameEvent, type GameStatus } from './types.js';
import { FIELD_HEIGHT, FIELD_WIDTH, PLAYER_SPEED, TARGET_FILL_PERCENTAGE } from './constants.js';
import { isPlayerTouchingEnemy, isTraceNearEnemy, queryCoveragePercentage } from './collision.js';
import { getPolygonArea } from './math/geometry.js';
import { Player } from './Player.js';
import { Qix, createEnemies } from './Qix.js';
import { createRng, type RngState } from './rng.js';

export const DEFAULT_GAME_CONFIG: GameConfig = {
  width: FIELD_WIDTH,
  height: FIELD_HEIGHT,
  targetFillPercentage: TARGET_FILL_PERCENTAGE,
  playerSpeed: PLAYER_SPEED,
  seed: 1,
};

/**
 * One game: a player, its territory and the enemies of the current level.
 * `update` advances exactly one frame.
 */
export class GameState {
  readonly config: GameConfig;
  level: number = 1;
  status: GameStatus = 'playing';
  player: Player;
  enemies: Qix[];

  private rng: RngState;
  private input: Direction = Direction.None;

  constructor(config: Partial<GameConfig> = {}) {
    this.config = { ...DEFAULT_GAME_CONFIG, ...config };

    const { targetFillPercentage, playerSpeed } = this.config;
    if (!(targetFillPercentage > 0 && targetFillPercentage <= 100)) {
      throw new RangeError(`Target fill must be in (0, 100], got ${targetFillPercentage}`);
    }
    if (!Number.isInteger(playerSpeed) || playerSpeed <= 0) {
      throw new RangeError(`Player speed must be a positive integer, got ${playerSpeed}`);
    }

    this.rng = createRng(this.config.seed);
    this.player = new Player(this.config, playerSpeed);
    this.enemies = createEnemies(this.level, this.config, this.rng);
  }

  get totalArea(): number {
    return this.config.width * this.config.height;
  }

  get fillPercentage(): number {
    return queryCoveragePercentage(this.player.territory, this.totalArea);
  }

  /**
   * Held direction, applied on every frame until changed
   */
  setInput(direction: Direction): void {
    this.input = direction;
  }

  startDrawing(): boolean {
    if (this.status !== 'playing') return false;
    return this.player.startTrace();
  }

  update(): GameEvent[] {
    const events: GameEvent[] = [];
    if (this.status !== 'playing') return events;

    const step = this.player.move(this.input);
    if (step?.kind === 'closed' && step.captured) {
      events.push({
        type: 'captured',
        area: getPolygonArea(step.closure.polygon),
        fillPercentage: this.fillPercentage,
        resolution: step.closure.resolution,
      });
    }

    for (const qix of this.enemies) {
      qix.update(this.player.territory, this.config);
    }

    if (this.checkCollision()) {
      this.status = 'lost';
      this.player.abortTrace();
      events.push({ type: 'collision' });
      return events;
    }

    const fill = this.fillPercentage;
    if (fill >= this.config.targetFillPercentage) {
      this.status = 'won';
      events.push({ type: 'won', fillPercentage: fill });
    }

    return events;
  }

  /**
   * Player body or in-progress trace touching any enemy
   */
  checkCollision(): boolean {
    const { player } = this;
    return this.enemies.some(
      (qix) =>
        isPlayerTouchingEnemy(player.position, player.radius, qix) ||
        (player.drawing && isTraceNearEnemy(player.trace, qix, qix.size))
    );
  }

  /**
   * New round. A won game moves on to the next level, anything else
   * starts over from level 1.
   */
  restart(): void {
    this.level = this.status === 'won' ? this.level + 1 : 1;
    this.status = 'playing';
    this.input = Direction.None;
    this.player.reset();
    this.enemies = createEnemies(this.level, this.config, this.rng);
  }
}
