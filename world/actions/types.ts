// ============================================================================
// RESULT TYPE - The board never throws, returns Result instead
// ============================================================================

/**
 * Location errors reported by the board:
 * - OUT_OF_BOUNDS: coordinate or index outside the allocated extent
 * - ALREADY_OCCUPIED: placement onto a non-empty cell
 * - NOT_OCCUPIED: removal or lookup on an empty cell
 */
export type LocationErrorCode = 'OUT_OF_BOUNDS' | 'ALREADY_OCCUPIED' | 'NOT_OCCUPIED';

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr<C extends string = LocationErrorCode> {
  readonly ok: false;
  readonly error: {
    readonly code: C;
    readonly message: string;
  };
}

export type Result<T, C extends string = LocationErrorCode> = ResultOk<T> | ResultErr<C>;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err<C extends string>(code: C, message: string): ResultErr<C> {
  return { ok: false, error: { code, message } };
}
