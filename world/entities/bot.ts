// ============================================================================
// BOT - An agent that can be placed on the board
// ============================================================================

/**
 * Contract the board needs from anything it stores.
 * The board reads `uid` for rendering and snapshots and never touches
 * anything else on the agent.
 */
export interface BoardAgent {
  readonly uid: string | number;
}

export interface Bot extends BoardAgent {
  displayName: string;
  color?: string;
}

/** Create a new Bot */
export function createBot(
  uid: string | number,
  displayName: string,
  color?: string
): Bot {
  return color === undefined ? { uid, displayName } : { uid, displayName, color };
}
