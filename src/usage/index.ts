/**
 * Usage Module
 *
 * Rolling quota lookup for the statusline: OAuth token, HTTP client,
 * on-disk cache and the cache-aside function that ties them together.
 */

export {
  readCache,
  writeCache,
  isStale,
  parseCacheBody,
  fiveHourUtilization,
} from './cache.js';
export { fetchUsage, createUsageFetcher } from './client.js';
export type { FetchResult, UsageFetcher, UsageClientOptions } from './client.js';
export { readAccessToken, getCredentialsPath, getClaudeConfigDir } from './credentials.js';
export { getFiveHourUtilization } from './five-hour.js';
export type { FiveHourOptions, FiveHourDeps } from './five-hour.js';
export { UsageResponseSchema, CredentialsFileSchema } from './schema.js';
