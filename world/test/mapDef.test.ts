import { describe, expect, it } from 'vitest';

import { createMapDef, cellCount, coordToIndex, indexToCoord, isInBounds } from '../map/mapDef';

describe('createMapDef', () => {
  it('floors dimensions and clamps negatives to zero', () => {
    expect(createMapDef(4.7, 3.2)).toEqual({ width: 4, height: 3 });
    expect(createMapDef(-2, 5)).toEqual({ width: 0, height: 5 });
  });
});

describe('coordToIndex', () => {
  const map = createMapDef(4, 3);

  it('maps every valid cell onto [0, width * height) exactly once', () => {
    const seen = new Set<number>();
    for (let y = 0; y < map.height; y++) {
      for (let x = 0; x < map.width; x++) {
        const index = coordToIndex(map, x, y);
        expect(index).toEqual({ ok: true, value: x + y * map.width });
        if (index.ok) seen.add(index.value);
      }
    }
    expect(seen.size).toBe(cellCount(map));
    expect(Math.min(...seen)).toBe(0);
    expect(Math.max(...seen)).toBe(11);
  });

  it('reports the last valid index for the far corner', () => {
    expect(coordToIndex(map, 3, 2)).toEqual({ ok: true, value: 11 });
  });

  it('rejects coordinates at or beyond the edges', () => {
    for (const [x, y] of [[4, 0], [0, 3], [4, 3], [-1, 0], [1.5, 0]]) {
      const result = coordToIndex(map, x, y);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('OUT_OF_BOUNDS');
    }
  });

  it('names the coordinate and board size in the error message', () => {
    expect(coordToIndex(map, 4, 0)).toEqual({
      ok: false,
      error: { code: 'OUT_OF_BOUNDS', message: '(4,0) is outside the 4x3 board' },
    });
  });

  it('has no valid coordinates on a zero-sized map', () => {
    const empty = createMapDef(0, 0);
    expect(cellCount(empty)).toBe(0);
    expect(isInBounds(empty, 0, 0)).toBe(false);
    expect(coordToIndex(empty, 0, 0).ok).toBe(false);
  });
});

describe('indexToCoord', () => {
  const map = createMapDef(4, 3);

  it('inverts coordToIndex', () => {
    for (let index = 0; index < cellCount(map); index++) {
      const coord = indexToCoord(map, index);
      expect(coord.ok).toBe(true);
      if (coord.ok) {
        expect(coordToIndex(map, coord.value.x, coord.value.y)).toEqual({ ok: true, value: index });
      }
    }
    expect(indexToCoord(map, 6)).toEqual({ ok: true, value: { x: 2, y: 1 } });
  });

  it('rejects indexes outside the buffer', () => {
    expect(indexToCoord(map, 12)).toEqual({
      ok: false,
      error: { code: 'OUT_OF_BOUNDS', message: 'Index 12 is outside the 4x3 board' },
    });
    expect(indexToCoord(map, -1).ok).toBe(false);
  });
});
