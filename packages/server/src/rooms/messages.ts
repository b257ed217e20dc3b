import { isDirection, type Direction } from '@qix/common';

export interface InputMessage {
  direction: Direction;
}

/**
 * Validate an `input` message payload; null for anything malformed
 */
export function parseInputMessage(message: unknown): InputMessage | null {
  if (typeof message !== 'object' || message === null || !('direction' in message)) {
    return null;
  }
  const { direction } = message;
  return isDirection(direction) ? { direction } : null;
}
