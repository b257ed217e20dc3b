import { describe, it, expect } from 'vitest';
import { Direction } from '@qix/common';
import { parseInputMessage } from '../messages.js';

describe('parseInputMessage', () => {
  it('accepts every direction', () => {
    expect(parseInputMessage({ direction: 'left' })).toEqual({ direction: Direction.Left });
    expect(parseInputMessage({ direction: 'none' })).toEqual({ direction: Direction.None });
  });

  it('drops extra fields', () => {
    expect(parseInputMessage({ direction: 'up', speed: 10 })).toEqual({ direction: Direction.Up });
  });

  it('rejects malformed payloads', () => {
    expect(parseInputMessage(null)).toBeNull();
    expect(parseInputMessage('up')).toBeNull();
    expect(parseInputMessage({})).toBeNull();
    expect(parseInputMessage({ direction: 'north' })).toBeNull();
    expect(parseInputMessage({ direction: 2 })).toBeNull();
  });
});
