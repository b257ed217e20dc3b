import { describe, it, expect, vi, afterEach } from 'vitest';
import { TerritorySet } from '../Territory.js';

const square = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 },
  { x: 0, y: 0 },
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TerritorySet', () => {
  it('accepts a closed polygon and tracks its area', () => {
    const territory = new TerritorySet();
    expect(territory.add(square)).toBe(true);
    expect(territory.size).toBe(1);
    expect(territory.filledArea).toBe(100);
  });

  it('rejects zero-area and non-finite polygons', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const territory = new TerritorySet();

    const flat = [
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 8, y: 0 },
      { x: 0, y: 0 },
    ];
    const broken = [
      { x: 0, y: 0 },
      { x: Number.NaN, y: 0 },
      { x: 5, y: 5 },
      { x: 0, y: 0 },
    ];

    expect(territory.add(flat)).toBe(false);
    expect(territory.add(broken)).toBe(false);
    expect(territory.size).toBe(0);
    expect(territory.filledArea).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('keeps its own copy of each polygon', () => {
    const territory = new TerritorySet();
    const ring = square.map((p) => ({ ...p }));
    territory.add(ring);
    ring[1].x = 500;
    expect(territory.polygons[0][1]).toEqual({ x: 10, y: 0 });
  });

  it('answers containment across polygons', () => {
    const territory = new TerritorySet();
    territory.add(square);
    territory.add(square.map((p) => ({ x: p.x + 50, y: p.y })));

    expect(territory.contains({ x: 5, y: 5 })).toBe(true);
    expect(territory.contains({ x: 55, y: 5 })).toBe(true);
    expect(territory.contains({ x: 30, y: 5 })).toBe(false);
  });

  it('finds points near an edge, tolerance inclusive', () => {
    const territory = new TerritorySet();
    territory.add(square);

    expect(territory.isNearEdge({ x: 5, y: 1.5 }, 2)).toBe(true);
    expect(territory.isNearEdge({ x: 12, y: 5 }, 2)).toBe(true);
    expect(territory.isNearEdge({ x: 12.5, y: 5 }, 2)).toBe(false);
    expect(territory.isNearEdge({ x: 5, y: 5 }, 2)).toBe(false);
  });

  it('finds edges that span several hash cells', () => {
    const territory = new TerritorySet();
    const wide = [
      { x: 0, y: 0 },
      { x: 1000, y: 0 },
      { x: 1000, y: 10 },
      { x: 0, y: 10 },
      { x: 0, y: 0 },
    ];
    territory.add(wide);
    expect(territory.isNearEdge({ x: 700, y: 1 }, 2)).toBe(true);
  });

  it('empties on clear', () => {
    const territory = new TerritorySet();
    territory.add(square);
    territory.clear();

    expect(territory.size).toBe(0);
    expect(territory.filledArea).toBe(0);
    expect(territory.contains({ x: 5, y: 5 })).toBe(false);
    expect(territory.isNearEdge({ x: 0, y: 5 }, 2)).toBe(false);
  });
});
