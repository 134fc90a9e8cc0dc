// ============================================================================
// MAP DEFINITION - Fixed-size board dimensions and row-major indexing
// ============================================================================

import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';

export interface MapDef {
  readonly width: number;
  readonly height: number;
}

export interface Coord {
  readonly x: number;
  readonly y: number;
}

/**
 * Create a new map definition.
 * Dimensions are floored and negatives clamped to 0. A zero-area map is
 * legal and has no valid coordinates.
 */
export function createMapDef(width: number, height: number): MapDef {
  return {
    width: Math.max(0, Math.floor(width)),
    height: Math.max(0, Math.floor(height)),
  };
}

/** Number of cells on the map */
export function cellCount(map: MapDef): number {
  return map.width * map.height;
}

/** Check if coordinates are within map bounds */
export function isInBounds(map: MapDef, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 && x < map.width &&
    y >= 0 && y < map.height
  );
}

/** Check if a linear index addresses a cell */
export function isIndexInBounds(map: MapDef, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < cellCount(map);
}

/**
 * Row-major mapping: index = x + y * width.
 * Every coordinate-based board operation goes through here.
 */
export function coordToIndex(map: MapDef, x: number, y: number): Result<number> {
  if (!isInBounds(map, x, y)) {
    return err(
      'OUT_OF_BOUNDS',
      `(${x},${y}) is outside the ${map.width}x${map.height} board`
    );
  }
  return ok(x + y * map.width);
}

/** Inverse of coordToIndex */
export function indexToCoord(map: MapDef, index: number): Result<Coord> {
  if (!isIndexInBounds(map, index)) {
    return err(
      'OUT_OF_BOUNDS',
      `Index ${index} is outside the ${map.width}x${map.height} board`
    );
  }
  return ok({ x: index % map.width, y: Math.floor(index / map.width) });
}
