/**
 * Usage Cache
 *
 * The raw body of the last successful usage response, stored as-is.
 * Freshness comes from the file's mtime, not from a timestamp inside it,
 * so a cache written by any other tool is honoured the same way.
 */

import type { StateWriteResult, UsageCacheEntry } from '../shared/types.js';
import { fileMtimeMs, readTextFile, writeTextFileAtomic } from '../state/index.js';
import { UsageResponseSchema } from './schema.js';

/**
 * Parse a raw response body into a cache entry, or null if it is not
 * a usage response.
 */
export function parseCacheBody(body: string, mtimeMs: number): UsageCacheEntry | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = UsageResponseSchema.safeParse(data);
  if (!parsed.success) return null;

  return { body: parsed.data, mtimeMs };
}

/**
 * Read the cache. Missing, unreadable or malformed files all return null,
 * which callers treat as a miss.
 */
export function readCache(path: string): UsageCacheEntry | null {
  const mtimeMs = fileMtimeMs(path);
  if (mtimeMs === null) return null;

  const { data } = readTextFile(path);
  if (data === undefined) return null;

  return parseCacheBody(data, mtimeMs);
}

/**
 * Overwrite the cache with a response body.
 */
export function writeCache(path: string, body: string): StateWriteResult {
  return writeTextFileAtomic(path, body);
}

/**
 * A cache is stale when missing or older than maxAgeMs.
 * An entry exactly maxAgeMs old is still fresh.
 */
export function isStale(
  entry: UsageCacheEntry | null,
  now: number,
  maxAgeMs: number
): boolean {
  if (!entry) return true;
  return now - entry.mtimeMs > maxAgeMs;
}

/**
 * Rolling 5-hour utilization from a cache entry, or null if the
 * response carried none.
 */
export function fiveHourUtilization(entry: UsageCacheEntry | null): number | null {
  const value = entry?.body.five_hour?.utilization;
  if (value === undefined || value === null || !Number.isFinite(value)) {
    return null;
  }
  return value;
}
