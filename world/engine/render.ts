// ============================================================================
// RENDER - Debug text views of a board
// ============================================================================

import type { BoardAgent } from '../entities/bot';
import type { BoardState } from '../state/boardState';
import { countOccupied } from '../state/boardState';

/**
 * Top row first, left to right. Occupied cells print the bot uid, empty
 * cells print their own coordinates. Rows are separated by a blank line.
 */
export function renderBoard<TBot extends BoardAgent>(state: BoardState<TBot>): string {
  const { width, height } = state.map;
  if (width === 0 || height === 0) return '';

  const rows: string[] = [];

  for (let y = 0; y < height; y++) {
    let row = '';
    for (let x = 0; x < width; x++) {
      const cell = state.cells[x + y * width];
      row += cell ? `  ${cell.bot().uid}   ` : `(${x},${y}) `;
    }
    rows.push(row);
  }

  return rows.join('\n\n');
}

/** One-line summary: dimensions and bot count */
export function describeBoard<TBot extends BoardAgent>(state: BoardState<TBot>): string {
  return `(width:${state.map.width}, height:${state.map.height}, number of bots:${countOccupied(state)})`;
}
