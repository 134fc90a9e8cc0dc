// ============================================================================
// BOARD ENGINE - The main API for placing and querying bots
// ============================================================================

import type { MapDef, Coord } from '../map/mapDef';
import type { Result } from '../actions/types';
import type { BoardAgent } from '../entities/bot';
import type { Facing } from '../entities/facing';
import type { BoardState } from '../state/boardState';
import { ok, err } from '../actions/types';
import { createMapDef, coordToIndex, indexToCoord, isIndexInBounds } from '../map/mapDef';
import { BotPlacement } from '../entities/placement';
import { createBoardState, countOccupied } from '../state/boardState';
import { renderBoard, describeBoard } from './render';

// ============================================================================
// SNAPSHOT TYPE
// ============================================================================

export interface PlacedBot {
  readonly uid: string | number;
  readonly x: number;
  readonly y: number;
  readonly index: number;
  readonly facing: Facing;
}

export interface BoardSnapshot {
  readonly map: MapDef;
  readonly bots: readonly PlacedBot[];
}

// ============================================================================
// BOARD CLASS
// ============================================================================

/**
 * Board is the single owner of every placed bot.
 *
 * Invariants:
 * - A cell holds at most one BotPlacement
 * - The cell buffer is never resized
 * - The board never throws - errors are returned as Result
 * - A failed operation leaves every cell as it was
 */
export class Board<TBot extends BoardAgent = BoardAgent> {
  private state: BoardState<TBot>;

  constructor(mapDef: MapDef) {
    this.state = createBoardState<TBot>(mapDef);
  }

  get width(): number {
    return this.state.map.width;
  }

  get height(): number {
    return this.state.map.height;
  }

  get cellCount(): number {
    return this.state.cells.length;
  }

  coordToIndex(x: number, y: number): Result<number> {
    return coordToIndex(this.state.map, x, y);
  }

  indexToCoord(index: number): Result<Coord> {
    return indexToCoord(this.state.map, index);
  }

  // ==========================================================================
  // PLACEMENT
  // ==========================================================================

  /**
   * Put a bot on an empty cell.
   * Facing is stored exactly as given.
   */
  addBot(bot: TBot, x: number, y: number, facing: Facing): Result<void> {
    const index = this.coordToIndex(x, y);
    if (!index.ok) return index;

    if (this.state.cells[index.value] !== null) {
      return err('ALREADY_OCCUPIED', `(${x},${y}) already holds a bot`);
    }

    this.state.cells[index.value] = new BotPlacement(bot, facing);
    return ok(undefined);
  }

  /** Take the placement at (x, y) off the board and hand it to the caller */
  removeBotAt(x: number, y: number): Result<BotPlacement<TBot>> {
    const index = this.coordToIndex(x, y);
    if (!index.ok) return index;
    return this.removeBotAtIndex(index.value);
  }

  removeBotAtIndex(index: number): Result<BotPlacement<TBot>> {
    const placement = this.getPlacementAtIndex(index);
    if (!placement.ok) return placement;

    this.state.cells[index] = null;
    return placement;
  }

  /**
   * Relocate a bot in one step, keeping its placement (and facing).
   * Moving onto the source cell counts as occupied.
   */
  moveBot(fromX: number, fromY: number, toX: number, toY: number): Result<void> {
    const from = this.coordToIndex(fromX, fromY);
    if (!from.ok) return from;
    const to = this.coordToIndex(toX, toY);
    if (!to.ok) return to;

    const placement = this.getPlacementAtIndex(from.value);
    if (!placement.ok) return placement;

    if (this.state.cells[to.value] !== null) {
      return err('ALREADY_OCCUPIED', `(${toX},${toY}) already holds a bot`);
    }

    this.state.cells[to.value] = placement.value;
    this.state.cells[from.value] = null;
    return ok(undefined);
  }

  // ==========================================================================
  // LOOKUP
  // ==========================================================================

  /** Placement still owned by the board, e.g. to turn the bot */
  getPlacementAt(x: number, y: number): Result<BotPlacement<TBot>> {
    const index = this.coordToIndex(x, y);
    if (!index.ok) return index;
    return this.getPlacementAtIndex(index.value);
  }

  getPlacementAtIndex(index: number): Result<BotPlacement<TBot>> {
    if (!isIndexInBounds(this.state.map, index)) {
      return err('OUT_OF_BOUNDS', `Index ${index} is outside the ${this.width}x${this.height} board`);
    }

    const cell = this.state.cells[index];
    if (cell === null) {
      return err('NOT_OCCUPIED', `Index ${index} holds no bot`);
    }
    return ok(cell);
  }

  getBotAt(x: number, y: number): Result<Readonly<TBot>> {
    const index = this.coordToIndex(x, y);
    if (!index.ok) return index;
    return this.getBotAtIndex(index.value);
  }

  getBotAtIndex(index: number): Result<Readonly<TBot>> {
    const placement = this.getPlacementAtIndex(index);
    if (!placement.ok) return placement;
    return ok(placement.value.bot());
  }

  /** Mutable access to a bot without moving it */
  getBotMutAt(x: number, y: number): Result<TBot> {
    const index = this.coordToIndex(x, y);
    if (!index.ok) return index;
    return this.getBotMutAtIndex(index.value);
  }

  getBotMutAtIndex(index: number): Result<TBot> {
    const placement = this.getPlacementAtIndex(index);
    if (!placement.ok) return placement;
    return ok(placement.value.botMut());
  }

  // ==========================================================================
  // VIEWS
  // ==========================================================================

  countBots(): number {
    return countOccupied(this.state);
  }

  /** Plain-data list of placed bots in index order */
  getSnapshot(): BoardSnapshot {
    const bots: PlacedBot[] = [];
    const { width } = this.state.map;

    this.state.cells.forEach((cell, index) => {
      if (cell === null) return;
      bots.push({
        uid: cell.bot().uid,
        x: index % width,
        y: Math.floor(index / width),
        index,
        facing: cell.getFacing(),
      });
    });

    return { map: this.state.map, bots };
  }

  render(): string {
    return renderBoard(this.state);
  }

  toString(): string {
    return describeBoard(this.state);
  }
}

/** Create an empty board of the given size */
export function createBoard<TBot extends BoardAgent = BoardAgent>(
  width: number,
  height: number
): Board<TBot> {
  return new Board<TBot>(createMapDef(width, height));
}
