import type { Enemy, FieldSize } from './types.js';
import { ENEMY_BASE_SIZE, ENEMY_DEFAULT_SIZE, ENEMY_SIZE_JITTER, ENEMY_SPEEDS } from './constants.js';
import { isPointCaptured } from './collision.js';
import { nextInt, pick, type RngState } from './rng.js';
import type { TerritorySet } from './Territory.js';

/**
 * Roaming enemy. Bounces off the field walls and picks a fresh random
 * heading whenever its centre ends up inside captured territory.
 */
export class Qix implements Enemy {
  x: number;
  y: number;
  dx: number;
  dy: number;
  size: number = ENEMY_DEFAULT_SIZE;

  private rng: RngState;

  constructor(x: number, y: number, rng: RngState) {
    this.x = x;
    this.y = y;
    this.rng = rng;
    this.dx = pick(rng, ENEMY_SPEEDS);
    this.dy = pick(rng, ENEMY_SPEEDS);
  }

  update(territory: TerritorySet, field: FieldSize): void {
    this.x += this.dx;
    this.y += this.dy;

    if (this.x - this.size < 0 || this.x + this.size > field.width) {
      this.dx *= -1;
    }
    if (this.y - this.size < 0 || this.y + this.size > field.height) {
      this.dy *= -1;
    }

    if (isPointCaptured({ x: this.x, y: this.y }, territory)) {
      this.redirect();
    }
  }

  redirect(): void {
    this.dx = pick(this.rng, ENEMY_SPEEDS);
    this.dy = pick(this.rng, ENEMY_SPEEDS);
  }
}

/**
 * Spawn level + 1 enemies spread evenly on an ellipse around the field centre
 */
export function createEnemies(level: number, field: FieldSize, rng: RngState): Qix[] {
  const count = level + 1;
  const cx = Math.floor(field.width / 2);
  const cy = Math.floor(field.height / 2);
  const rx = Math.floor(field.width / 4);
  const ry = Math.floor(field.height / 4);

  const enemies: Qix[] = [];
  for (let i = 0; i < count; i++) {
    const angle = (2 * Math.PI * i) / count;
    const qix = new Qix(cx + Math.trunc(rx * Math.cos(angle)), cy + Math.trunc(ry * Math.sin(angle)), rng);
    qix.size = ENEMY_BASE_SIZE + nextInt(rng, -ENEMY_SIZE_JITTER, ENEMY_SIZE_JITTER);
    enemies.push(qix);
  }
  return enemies;
}
