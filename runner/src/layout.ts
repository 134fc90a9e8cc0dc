import type { Board, Bot, Facing, LocationErrorCode, Result } from '../../world/index';
import { createBot, NORTH, ok, err } from '../../world/index';

// ============================================================================
// LAYOUT TYPES
// ============================================================================

export interface LayoutBot {
  readonly uid: string | number;
  readonly displayName: string;
  readonly x: number;
  readonly y: number;
  readonly facing: Facing;
}

export interface Layout {
  readonly bots: readonly LayoutBot[];
}

export interface PlacementFailure {
  readonly uid: string | number;
  readonly code: LocationErrorCode;
  readonly message: string;
}

export interface LayoutReport {
  readonly placed: number;
  readonly failures: readonly PlacementFailure[];
}

// ============================================================================
// VALIDATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLayoutBot(raw: unknown, position: number): Result<LayoutBot, 'INVALID_LAYOUT'> {
  if (!isRecord(raw)) {
    return err('INVALID_LAYOUT', `bots[${position}] must be an object`);
  }

  const { uid, displayName, x, y, facing } = raw;
  if (typeof uid !== 'string' && typeof uid !== 'number') {
    return err('INVALID_LAYOUT', `bots[${position}].uid must be a string or number`);
  }
  if (typeof displayName !== 'string') {
    return err('INVALID_LAYOUT', `bots[${position}].displayName must be a string`);
  }
  if (typeof x !== 'number' || typeof y !== 'number') {
    return err('INVALID_LAYOUT', `bots[${position}] needs numeric x and y`);
  }
  if (facing !== undefined && typeof facing !== 'number') {
    return err('INVALID_LAYOUT', `bots[${position}].facing must be a number`);
  }

  return ok({ uid, displayName, x, y, facing: facing ?? NORTH });
}

/** Validate a parsed layout document */
export function parseLayout(raw: unknown): Result<Layout, 'INVALID_LAYOUT'> {
  const entries: unknown = isRecord(raw) ? raw.bots : undefined;
  if (!Array.isArray(entries)) {
    return err('INVALID_LAYOUT', 'Layout must be an object with a "bots" array');
  }

  const bots: LayoutBot[] = [];
  for (const [position, entry] of entries.entries()) {
    const parsed = parseLayoutBot(entry, position);
    if (!parsed.ok) return parsed;
    bots.push(parsed.value);
  }

  return ok({ bots });
}

// ============================================================================
// APPLICATION
// ============================================================================

/**
 * Place every layout bot on the board.
 * A bot that cannot be placed is reported and skipped; the rest still go in.
 */
export function applyLayout(board: Board<Bot>, layout: Layout): LayoutReport {
  let placed = 0;
  const failures: PlacementFailure[] = [];

  for (const entry of layout.bots) {
    const result = board.addBot(createBot(entry.uid, entry.displayName), entry.x, entry.y, entry.facing);
    if (result.ok) {
      placed++;
    } else {
      failures.push({ uid: entry.uid, ...result.error });
    }
  }

  return { placed, failures };
}
