/**
 * Config Module
 *
 * Re-exports everything from the loader for clean imports:
 *   import { loadConfig, DEFAULT_CONFIG } from './config/index.js';
 */

export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  deepMerge,
  DEFAULT_CONFIG,
  DEFAULT_USAGE_ENDPOINT,
  resolveStatuslineSettings,
  resolveLessonSettings,
} from './loader.js';
export type { StatuslineSettings, LessonSettings } from './loader.js';
export { PluginConfigSchema, StatuslineConfigSchema, LessonConfigSchema } from './schema.js';
