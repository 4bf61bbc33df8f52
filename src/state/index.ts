/**
 * State Module
 *
 * File helpers for the usage cache, credentials and the lesson log.
 */

export {
  ensureParentDir,
  readTextFile,
  readJsonFile,
  fileMtimeMs,
  writeTextFileAtomic,
  appendTextFile,
} from './store.js';
