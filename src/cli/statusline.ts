#!/usr/bin/env node
/**
 * statusLine command
 *
 *   "statusLine": { "type": "command", "command": "statusline-coach-statusline" }
 *
 * Prints one line and exits 0, whatever happens.
 */

import { loadConfig } from '../config/index.js';
import { renderFallback, runStatusline } from '../hud/index.js';
import { createDebugLogger, readStdin } from '../shared/index.js';

async function main(): Promise<void> {
  const config = loadConfig(process.cwd(), (message) => {
    createDebugLogger('config', true)(message);
  });
  const debug = createDebugLogger('statusline', config.debug === true);

  let line: string;
  try {
    line = await runStatusline(await readStdin(), config);
  } catch (err) {
    debug('pipeline failed, rendering fallback', err);
    line = renderFallback();
  }
  process.stdout.write(line);
}

main().catch((err: unknown) => {
  createDebugLogger('statusline', true)('unexpected failure', err);
  process.stdout.write(renderFallback());
});
