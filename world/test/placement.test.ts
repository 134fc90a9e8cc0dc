import { describe, expect, it } from 'vitest';

import { createBot } from '../entities/bot';
import { BotPlacement } from '../entities/placement';
import { EAST, SOUTH, WEST } from '../entities/facing';

describe('BotPlacement', () => {
  it('stores the facing as given', () => {
    const placement = new BotPlacement(createBot(1, 'Scout'), EAST);
    expect(placement.getFacing()).toBe(90);

    placement.setFacing(WEST);
    expect(placement.getFacing()).toBe(270);
  });

  it('does not normalize out-of-range facings', () => {
    const placement = new BotPlacement(createBot(1, 'Scout'), SOUTH);
    placement.setFacing(450);
    expect(placement.getFacing()).toBe(450);
    placement.setFacing(-90);
    expect(placement.getFacing()).toBe(-90);
  });

  it('exposes the same bot through both accessors', () => {
    const bot = createBot('b-7', 'Hauler');
    const placement = new BotPlacement(bot, SOUTH);

    expect(placement.bot()).toBe(bot);
    placement.botMut().displayName = 'Heavy Hauler';
    expect(placement.bot().displayName).toBe('Heavy Hauler');
  });

  it('describes itself with uid and facing', () => {
    expect(String(new BotPlacement(createBot(42, 'Scout'), SOUTH))).toBe('[Bot: 42, Facing: 180]');
  });
});

describe('createBot', () => {
  it('only sets color when given', () => {
    expect(createBot(1, 'Scout')).toEqual({ uid: 1, displayName: 'Scout' });
    expect(createBot(2, 'Hauler', 'red')).toEqual({ uid: 2, displayName: 'Hauler', color: 'red' });
  });
});
