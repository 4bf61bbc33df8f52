/**
 * statusline-coach
 *
 * Hooks for the Claude Code CLI: a statusline with context and 5h quota
 * bars, and an English lesson banner on every prompt.
 */

// Config
export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  deepMerge,
  resolveStatuslineSettings,
  resolveLessonSettings,
  DEFAULT_CONFIG,
} from './config/index.js';
export type { StatuslineSettings, LessonSettings } from './config/index.js';

// Hooks
export {
  processEnglishLesson,
  buildLessonRequest,
  parseLessonResponse,
  formatLesson,
  formatBanner,
} from './hooks/index.js';
export type { LessonRunner } from './hooks/index.js';

// HUD
export {
  runStatusline,
  render,
  renderBar,
  usageLevel,
  formatDuration,
  getGitBranch,
} from './hud/index.js';
export type { StatuslineDeps, GitRunner } from './hud/index.js';

// Usage
export {
  getFiveHourUtilization,
  readCache,
  writeCache,
  isStale,
  readAccessToken,
  fetchUsage,
} from './usage/index.js';
export type { UsageFetcher, FetchResult } from './usage/index.js';

// Types
export type {
  PluginConfig,
  PromptHookInput,
  SystemMessageOutput,
  StatuslineInput,
  StatusFields,
  RenderInput,
  UsageLevel,
  UsageResponse,
  Lesson,
  LessonRequest,
} from './shared/types.js';
