import { describe, expect, it } from 'vitest';

import { loadRunnerConfig, ConfigError } from '../src/config';

describe('loadRunnerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadRunnerConfig({})).toEqual({
      boardWidth: 4,
      boardHeight: 3,
      layoutPath: 'runner/layouts/demo.json',
    });
  });

  it('reads board size and layout from the environment', () => {
    expect(
      loadRunnerConfig({ BOARD_WIDTH: '10', BOARD_HEIGHT: '0', BOARD_LAYOUT: 'layouts/empty.json' })
    ).toEqual({
      boardWidth: 10,
      boardHeight: 0,
      layoutPath: 'layouts/empty.json',
    });
  });

  it('rejects a dimension that is not a non-negative integer', () => {
    expect(() => loadRunnerConfig({ BOARD_WIDTH: 'wide' })).toThrow(ConfigError);
    expect(() => loadRunnerConfig({ BOARD_HEIGHT: '-1' })).toThrow(
      'BOARD_HEIGHT must be a non-negative integer, got "-1"'
    );
  });
});
