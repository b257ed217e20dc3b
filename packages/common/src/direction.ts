import { Direction } from './types.js';

const VECTORS: Record<Direction, { dx: number; dy: number }> = {
  [Direction.None]: { dx: 0, dy: 0 },
  [Direction.Up]: { dx: 0, dy: -1 },
  [Direction.Down]: { dx: 0, dy: 1 },
  [Direction.Left]: { dx: -1, dy: 0 },
  [Direction.Right]: { dx: 1, dy: 0 },
};

const DIRECTION_VALUES: readonly string[] = Object.values(Direction);

function isHorizontal(direction: Direction): boolean {
  return direction === Direction.Left || direction === Direction.Right;
}

function isVertical(direction: Direction): boolean {
  return direction === Direction.Up || direction === Direction.Down;
}

/**
 * Direction after applying an intent while drawing.
 * The first intent is always taken; after that only 90° turns are.
 */
export function nextDirection(current: Direction, intent: Direction): Direction {
  if (intent === Direction.None) return current;
  if (current === Direction.None) return intent;

  const turns =
    (isHorizontal(current) && isVertical(intent)) || (isVertical(current) && isHorizontal(intent));
  return turns ? intent : current;
}

export function directionVector(direction: Direction): { dx: number; dy: number } {
  return VECTORS[direction];
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTION_VALUES.includes(value);
}
