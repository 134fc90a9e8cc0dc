// ============================================================================
// BOARD STATE - The cell buffer owned by a single board
// ============================================================================

import type { MapDef } from '../map/mapDef';
import { cellCount } from '../map/mapDef';
import type { BoardAgent } from '../entities/bot';
import type { BotPlacement } from '../entities/placement';

export type Cell<TBot extends BoardAgent> = BotPlacement<TBot> | null;

export interface BoardState<TBot extends BoardAgent> {
  readonly map: MapDef;
  /** Row-major, length width * height, never resized */
  readonly cells: Cell<TBot>[];
}

/** Create initial board state with every cell empty */
export function createBoardState<TBot extends BoardAgent>(map: MapDef): BoardState<TBot> {
  return {
    map,
    cells: Array.from({ length: cellCount(map) }, (): Cell<TBot> => null),
  };
}

/** Count occupied cells (full scan) */
export function countOccupied<TBot extends BoardAgent>(state: BoardState<TBot>): number {
  let count = 0;
  for (const cell of state.cells) {
    if (cell !== null) count++;
  }
  return count;
}
