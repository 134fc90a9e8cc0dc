// ============================================================================
// FACING - Orientation in degrees clockwise from north
// ============================================================================

/**
 * Canonical headings. Any angle is a legal facing; these are just the
 * four the simulation uses most.
 */
export const NORTH = 0;
export const EAST = 90;
export const SOUTH = 180;
export const WEST = 270;

export type Facing = number;
