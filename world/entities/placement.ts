// ============================================================================
// BOT PLACEMENT - A bot and its facing, as stored in one board cell
// ============================================================================

import type { BoardAgent } from './bot';
import type { Facing } from './facing';

/**
 * Owns its bot for as long as it sits on the board. Removing it from the
 * board hands the whole placement (and the bot with it) to the caller.
 */
export class BotPlacement<TBot extends BoardAgent = BoardAgent> {
  private readonly agent: TBot;
  private facing: Facing;

  constructor(bot: TBot, facing: Facing) {
    this.agent = bot;
    this.facing = facing;
  }

  /** Read-only view of the bot */
  bot(): Readonly<TBot> {
    return this.agent;
  }

  /** Mutable access, for changing bot state in place */
  botMut(): TBot {
    return this.agent;
  }

  getFacing(): Facing {
    return this.facing;
  }

  /** Overwrites the facing as given. No range check. */
  setFacing(newFacing: Facing): void {
    this.facing = newFacing;
  }

  toString(): string {
    return `[Bot: ${this.agent.uid}, Facing: ${this.facing}]`;
  }
}
