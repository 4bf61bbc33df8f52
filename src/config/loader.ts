/**
 * Configuration Loader
 *
 * Loads and merges configuration from multiple sources with a clear precedence:
 *   defaults → user config → project config → env vars
 *
 * Both hooks read from a single PluginConfig object. The loader handles all
 * the merging so consumers never worry about where a value came from.
 *
 * Config files use JSONC (JSON with Comments):
 *
 *   // ~/.config/statusline-coach/config.jsonc
 *   {
 *     // Refresh the 5h limit every minute
 *     "statusline": {
 *       "cacheMaxAgeSeconds": 60
 *     }
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir, tmpdir } from 'os';
import * as jsonc from 'jsonc-parser';
import type { ZodType } from 'zod';
import type { PluginConfig } from '../shared/types.js';
import { PluginConfigSchema, StatuslineConfigSchema } from './schema.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_USAGE_ENDPOINT = 'https://api.anthropic.com/api/oauth/usage';

export type StatuslineSettings = Required<NonNullable<PluginConfig['statusline']>>;
export type LessonSettings = Required<NonNullable<PluginConfig['lesson']>>;

const DEFAULT_STATUSLINE: StatuslineSettings = {
  cacheMaxAgeSeconds: 30,
  fetchTimeoutMs: 3000,
  usageEndpoint: DEFAULT_USAGE_ENDPOINT,
  cachePath: join(tmpdir(), 'claude-statusline-usage-cache'),
  showQuota: true,
  showBranch: true,
};

const DEFAULT_LESSON: LessonSettings = {
  enabled: true,
  targetLanguage: 'Korean',
  model: 'sonnet',
  logPath: join(homedir(), '.claude', 'logs', 'english-lessons.log'),
  timeoutMs: 60_000,
};

export const DEFAULT_CONFIG: PluginConfig = {
  statusline: DEFAULT_STATUSLINE,
  lesson: DEFAULT_LESSON,
  debug: false,
};

/**
 * Statusline settings with every default filled in.
 */
export function resolveStatuslineSettings(config: PluginConfig): StatuslineSettings {
  return deepMerge(DEFAULT_STATUSLINE, config.statusline ?? {});
}

/**
 * Lesson hook settings with every default filled in.
 */
export function resolveLessonSettings(config: PluginConfig): LessonSettings {
  return deepMerge(DEFAULT_LESSON, config.lesson ?? {});
}

// ---------------------------------------------------------------------------
// Config file paths
// ---------------------------------------------------------------------------

/**
 * Get paths for user-level and project-level config files.
 *
 *   User:    ~/.config/statusline-coach/config.jsonc
 *   Project: .claude/statusline-coach.jsonc
 *
 * XDG_CONFIG_HOME is respected if set.
 */
export function getConfigPaths(workingDirectory?: string): {
  user: string;
  project: string;
} {
  const userConfigDir =
    process.env.XDG_CONFIG_HOME ?? join(homedir(), '.config');

  return {
    user: join(userConfigDir, 'statusline-coach', 'config.jsonc'),
    project: join(
      workingDirectory ?? process.cwd(),
      '.claude',
      'statusline-coach.jsonc'
    ),
  };
}

// ---------------------------------------------------------------------------
// JSONC file loader
// ---------------------------------------------------------------------------

/**
 * Load and parse a JSONC file. Returns null if the file doesn't exist,
 * is empty, or doesn't match the config shape.
 *
 * Syntax errors are reported through onWarning; a file with recoverable
 * errors still contributes whatever jsonc-parser recovered.
 */
export function loadJsoncFile(
  path: string,
  onWarning: (message: string) => void = (message) => console.warn(message)
): PluginConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const errors: jsonc.ParseError[] = [];
    const result: unknown = jsonc.parse(content, errors, {
      allowTrailingComma: true,
      allowEmptyContent: true,
    });

    if (errors.length > 0) {
      const codes = errors.map((e) => jsonc.printParseErrorCode(e.error));
      onWarning(`Warning: Parse errors in ${path}: ${codes.join(', ')}`);
    }

    if (result === undefined) return null;

    const parsed = PluginConfigSchema.safeParse(result);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      onWarning(`Warning: Invalid config in ${path}: ${issues.join('; ')}`);
      return null;
    }
    return parsed.data;
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

/**
 * Recursively merge source into target. Objects are merged key-by-key,
 * primitives and arrays are replaced wholesale.
 *
 *   deepMerge(
 *     { statusline: { cacheMaxAgeSeconds: 30, fetchTimeoutMs: 3000 } },
 *     { statusline: { cacheMaxAgeSeconds: 60 } }
 *   )
 *   // { statusline: { cacheMaxAgeSeconds: 60, fetchTimeoutMs: 3000 } }
 */
export function deepMerge<T extends object>(
  target: T,
  source: Partial<T>
): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (
      sourceValue !== undefined &&
      typeof sourceValue === 'object' &&
      sourceValue !== null &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === 'object' &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(
        targetValue as Record<string, unknown>,
        sourceValue as Record<string, unknown>
      ) as T[keyof T];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

/** A numeric env var checked against the same rule as the config file field. */
function readNumber(name: string, schema: ZodType<number>): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const result = schema.safeParse(Number(raw));
  return result.success ? result.data : undefined;
}

function readFlag(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  return raw === 'true' || raw === '1';
}

/**
 * Load config overrides from STATUSLINE_COACH_* environment variables.
 * Highest precedence. Values a config file would reject are ignored.
 */
export function loadEnvConfig(): Partial<PluginConfig> {
  const config: Partial<PluginConfig> = {};

  const debug = readFlag('STATUSLINE_COACH_DEBUG');
  if (debug !== undefined) {
    config.debug = debug;
  }

  const maxAge = readNumber(
    'STATUSLINE_COACH_CACHE_MAX_AGE',
    StatuslineConfigSchema.shape.cacheMaxAgeSeconds
  );
  if (maxAge !== undefined) {
    config.statusline = { ...config.statusline, cacheMaxAgeSeconds: maxAge };
  }

  const timeout = readNumber(
    'STATUSLINE_COACH_FETCH_TIMEOUT_MS',
    StatuslineConfigSchema.shape.fetchTimeoutMs
  );
  if (timeout !== undefined) {
    config.statusline = { ...config.statusline, fetchTimeoutMs: timeout };
  }

  const cachePath = process.env.STATUSLINE_COACH_CACHE_PATH;
  if (cachePath) {
    config.statusline = { ...config.statusline, cachePath };
  }

  const lesson = readFlag('STATUSLINE_COACH_LESSON');
  if (lesson !== undefined) {
    config.lesson = { ...config.lesson, enabled: lesson };
  }

  const language = process.env.STATUSLINE_COACH_TARGET_LANGUAGE;
  if (language) {
    config.lesson = { ...config.lesson, targetLanguage: language };
  }

  return config;
}

// ---------------------------------------------------------------------------
// Main loader
// ---------------------------------------------------------------------------

/**
 * Load the fully merged configuration.
 *
 * Merge order (lowest to highest precedence):
 *   1. DEFAULT_CONFIG
 *   2. User config          — ~/.config/statusline-coach/config.jsonc
 *   3. Project config       — .claude/statusline-coach.jsonc
 *   4. Environment vars     — STATUSLINE_COACH_* variables
 */
export function loadConfig(
  workingDirectory?: string,
  onWarning?: (message: string) => void
): PluginConfig {
  let config: PluginConfig = { ...DEFAULT_CONFIG };

  const paths = getConfigPaths(workingDirectory);

  const userConfig = loadJsoncFile(paths.user, onWarning);
  if (userConfig) {
    config = deepMerge(config, userConfig);
  }

  const projectConfig = loadJsoncFile(paths.project, onWarning);
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  const envConfig = loadEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    config = deepMerge(config, envConfig);
  }

  return config;
}
