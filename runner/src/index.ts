import { readFile } from 'node:fs/promises';
import { createBoard } from '../../world/index';
import type { Bot } from '../../world/index';
import { loadRunnerConfig, ConfigError } from './config';
import { parseLayout, applyLayout } from './layout';

// ============================================================================
// RUNNER - Build a board from a layout file and print it
// ============================================================================

async function main(): Promise<number> {
  const config = loadRunnerConfig();
  const board = createBoard<Bot>(config.boardWidth, config.boardHeight);

  console.log(`[Runner] Loading layout ${config.layoutPath} onto a ${board.width}x${board.height} board`);

  const layout = parseLayout(JSON.parse(await readFile(config.layoutPath, 'utf8')));
  if (!layout.ok) {
    console.error(`[Runner] ${layout.error.message}`);
    return 1;
  }

  const report = applyLayout(board, layout.value);
  for (const failure of report.failures) {
    console.error(`[Runner] Could not place bot ${failure.uid}: ${failure.code} - ${failure.message}`);
  }

  console.log(`[Runner] Placed ${report.placed}/${layout.value.bots.length} bots\n`);
  console.log(board.render());
  console.log(`\n${board.toString()}`);

  return report.failures.length > 0 ? 2 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    if (e instanceof ConfigError) {
      console.error(`ERROR: ${e.message}`);
    } else {
      console.error('[Runner] Failed to build board:', e);
    }
    process.exitCode = 1;
  }
);
