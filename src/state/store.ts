/**
 * File Store
 *
 * Lightweight file-based persistence for hook state. Hooks run as
 * short-lived subprocesses, so every operation is synchronous and reports
 * failure through its result instead of throwing.
 *
 * Primitives:
 *   - JSON/text read: parse a whole file, or report it missing
 *   - atomic write: temp file + rename, so readers never see a torn file
 *   - append: line-oriented logs
 *   - mtime: last modification time, for age checks
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'fs';
import { dirname } from 'path';
import type { StateReadResult, StateWriteResult } from '../shared/types.js';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create the parent directory of a file if it is missing.
 */
export function ensureParentDir(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

/**
 * Read a text file. Returns { exists: false } if it is missing or unreadable.
 */
export function readTextFile(path: string): StateReadResult<string> {
  try {
    if (!existsSync(path)) {
      return { exists: false };
    }
    return { exists: true, data: readFileSync(path, 'utf-8'), foundAt: path };
  } catch {
    return { exists: false };
  }
}

/**
 * Read and parse a JSON file. Returns { exists: false } if it is missing,
 * unreadable or not valid JSON. The data is unknown: validate before use.
 */
export function readJsonFile(path: string): StateReadResult<unknown> {
  const text = readTextFile(path);
  if (!text.exists || text.data === undefined) {
    return { exists: false };
  }
  try {
    const data: unknown = JSON.parse(text.data);
    return { exists: true, data, foundAt: path };
  } catch {
    return { exists: false };
  }
}

/**
 * Modification time of a file, or null if it is missing.
 */
export function fileMtimeMs(path: string): number | null {
  try {
    return statSync(path).mtimeMs;
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Write
// ---------------------------------------------------------------------------

/**
 * Replace a file's contents atomically: write a sibling temp file, then
 * rename it over the target. Creates directories if needed.
 */
export function writeTextFileAtomic(path: string, content: string): StateWriteResult {
  const tmpPath = `${path}.tmp.${process.pid}`;
  try {
    ensureParentDir(path);
    writeFileSync(tmpPath, content, 'utf-8');
    renameSync(tmpPath, path);
    return { success: true, path };
  } catch (err: unknown) {
    try {
      if (existsSync(tmpPath)) unlinkSync(tmpPath);
    } catch {
      // orphaned temp file; the next successful write replaces the target anyway
    }
    return { success: false, path, error: errorMessage(err) };
  }
}

/**
 * Append text to a file. Creates directories and the file if needed.
 */
export function appendTextFile(path: string, content: string): StateWriteResult {
  try {
    ensureParentDir(path);
    appendFileSync(path, content, 'utf-8');
    return { success: true, path };
  } catch (err: unknown) {
    return { success: false, path, error: errorMessage(err) };
  }
}
