/**
 * Rolling 5-hour utilization, cache-aside.
 *
 *   1. Read the cache and check its age.
 *   2. Missing, malformed or older than maxAgeMs → one fetch attempt.
 *   3. Success overwrites the cache; failure leaves it alone.
 *   4. Answer from whatever the cache now holds.
 *
 * No retry, no backoff. A failed fetch falls back to the stale cache, and
 * with no cache at all the value is unavailable (null).
 */

import type { DebugLogger } from '../shared/debug.js';
import {
  fiveHourUtilization,
  isStale,
  parseCacheBody,
  readCache,
  writeCache,
} from './cache.js';
import type { UsageFetcher } from './client.js';

export interface FiveHourOptions {
  cachePath: string;
  maxAgeMs: number;
}

export interface FiveHourDeps {
  fetchUsage: UsageFetcher;
  readToken: () => string | null;
  now?: () => number;
  debug?: DebugLogger;
}

export async function getFiveHourUtilization(
  { cachePath, maxAgeMs }: FiveHourOptions,
  { fetchUsage, readToken, now = Date.now, debug = () => {} }: FiveHourDeps
): Promise<number | null> {
  let entry = readCache(cachePath);

  if (isStale(entry, now(), maxAgeMs)) {
    const token = readToken();
    if (!token) {
      debug('no OAuth access token, using cached usage');
    } else {
      const result = await fetchUsage(token);
      if (result.ok) {
        const written = writeCache(cachePath, result.body);
        if (written.success) {
          entry = readCache(cachePath) ?? entry;
        } else {
          debug(`cache write failed for ${written.path}: ${written.error ?? 'unknown error'}`);
          entry = parseCacheBody(result.body, now()) ?? entry;
        }
      } else {
        debug(`fetch failed, using cached usage: ${result.reason}`);
      }
    }
  }

  return fiveHourUtilization(entry);
}
