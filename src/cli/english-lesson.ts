#!/usr/bin/env node
/**
 * UserPromptSubmit hook
 *
 *   "hooks": { "UserPromptSubmit": [{ "hooks": [
 *     { "type": "command", "command": "statusline-coach-english-lesson" }
 *   ] }] }
 *
 * Prints {"systemMessage": ...} or nothing, and always exits 0 so the
 * prompt goes through untouched.
 */

import { loadConfig } from '../config/index.js';
import { processEnglishLesson } from '../hooks/index.js';
import { createDebugLogger, readStdin } from '../shared/index.js';

async function main(): Promise<void> {
  const config = loadConfig(process.cwd(), (message) => {
    createDebugLogger('config', true)(message);
  });
  const output = await processEnglishLesson(await readStdin(), config);
  if (output) {
    process.stdout.write(JSON.stringify(output));
  }
}

main().catch((err: unknown) => {
  createDebugLogger('english-lesson', true)('unexpected failure', err);
});
