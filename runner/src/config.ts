import 'dotenv/config';

// Defaults give a 4x3 board, small enough to read in a terminal
export const DEFAULT_BOARD_WIDTH = 4;
export const DEFAULT_BOARD_HEIGHT = 3;
export const DEFAULT_BOARD_LAYOUT = 'runner/layouts/demo.json';

export interface RunnerConfig {
  readonly boardWidth: number;
  readonly boardHeight: number;
  /** Layout file, relative to the working directory */
  readonly layoutPath: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readDimension(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    boardWidth: readDimension(env, 'BOARD_WIDTH', DEFAULT_BOARD_WIDTH),
    boardHeight: readDimension(env, 'BOARD_HEIGHT', DEFAULT_BOARD_HEIGHT),
    layoutPath: env.BOARD_LAYOUT || DEFAULT_BOARD_LAYOUT,
  };
}
