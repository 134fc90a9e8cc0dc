// ============================================================================
// WORLD MODULE - Fixed-size board tracking bot positions and facings
// ============================================================================

// Core engine
export { Board, createBoard } from './engine/board';
export type { BoardSnapshot, PlacedBot } from './engine/board';
export { renderBoard, describeBoard } from './engine/render';

// Entities
export { createBot } from './entities/bot';
export type { Bot, BoardAgent } from './entities/bot';
export { BotPlacement } from './entities/placement';
export { NORTH, EAST, SOUTH, WEST } from './entities/facing';
export type { Facing } from './entities/facing';

// Map
export {
  createMapDef,
  cellCount,
  isInBounds,
  isIndexInBounds,
  coordToIndex,
  indexToCoord,
} from './map/mapDef';
export type { MapDef, Coord } from './map/mapDef';

// Results
export type {
  Result,
  ResultOk,
  ResultErr,
  LocationErrorCode,
} from './actions/types';
export { ok, err } from './actions/types';

// State (exposed for testing/advanced use)
export type { BoardState, Cell } from './state/boardState';
export { createBoardState, countOccupied } from './state/boardState';
