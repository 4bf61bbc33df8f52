/**
 * Shared types for statusline-coach
 *
 * These types define the hook contract between Claude Code and our hooks.
 * Claude Code sends a JSON object via stdin, each hook answers on stdout:
 * the statusline with a line of text, the prompt hook with a JSON object.
 */

// ---------------------------------------------------------------------------
// Hook Contract Types
// ---------------------------------------------------------------------------

/**
 * Input from the UserPromptSubmit hook (received via stdin as JSON).
 * Only the fields we read are listed; everything else is ignored.
 */
export interface PromptHookInput {
  /** Unique session identifier */
  session_id?: string;
  /** Working directory for the session */
  cwd?: string;
  /** User's prompt text */
  prompt?: string;
}

/**
 * Hook output whose systemMessage is shown in the user's terminal
 * and never reaches the model's context.
 */
export interface SystemMessageOutput {
  systemMessage: string;
}

// ---------------------------------------------------------------------------
// Plugin Types
// ---------------------------------------------------------------------------

/**
 * Plugin configuration.
 *
 * Every property is optional. Defaults are defined in config/loader.ts.
 * The config is built by merging: defaults → user config → project config → env vars.
 */
export interface PluginConfig {
  /** Statusline renderer settings */
  statusline?: {
    /** Usage cache is refetched once older than this (default: 30) */
    cacheMaxAgeSeconds?: number;
    /** Timeout for the usage request (default: 3000) */
    fetchTimeoutMs?: number;
    /** Usage-reporting endpoint */
    usageEndpoint?: string;
    /** Where the raw usage response is cached (default: <tmpdir>/claude-statusline-usage-cache) */
    cachePath?: string;
    /** Render the 5h limit segment (default: true) */
    showQuota?: boolean;
    /** Append the git branch to the workspace segment (default: true) */
    showBranch?: boolean;
  };

  /** English lesson hook settings */
  lesson?: {
    /** Run the hook at all (default: true) */
    enabled?: boolean;
    /** Language used for praise, explanations and tips (default: Korean) */
    targetLanguage?: string;
    /** Model alias passed to the CLI (default: sonnet) */
    model?: string;
    /** Append-only lesson log (default: ~/.claude/logs/english-lessons.log) */
    logPath?: string;
    /** Timeout for the CLI call (default: 60000) */
    timeoutMs?: number;
  };

  /** Write diagnostics for silent fallbacks to stderr (default: false) */
  debug?: boolean;
}

// ---------------------------------------------------------------------------
// File Store Types
// ---------------------------------------------------------------------------

/** Result of reading a file. */
export interface StateReadResult<T> {
  /** Whether the file existed and could be parsed */
  exists: boolean;
  /** Parsed data (undefined if not found) */
  data?: T;
  /** Path where the file was found */
  foundAt?: string;
}

/** Result of writing a file. */
export interface StateWriteResult {
  /** Whether the write succeeded */
  success: boolean;
  /** Path the file was written to */
  path: string;
  /** Error message if write failed */
  error?: string;
}

// ---------------------------------------------------------------------------
// HUD / Statusline Types
// ---------------------------------------------------------------------------

/**
 * JSON that Claude Code pipes to the statusline command via stdin.
 */
export interface StatuslineInput {
  /** Session identifier, sometimes the transcript file name */
  session_id?: string;
  workspace?: {
    current_dir?: string;
  };
  /** Context window usage; null right after session start */
  context_window?: {
    used_percentage?: number | null;
  };
  cost?: {
    total_duration_ms?: number;
  };
}

/** Fields the renderer needs, after parsing and defaulting. */
export interface StatusFields {
  /** Session name with .jsonl stripped; empty when absent */
  sessionName: string;
  /** Full workspace path; empty when absent */
  currentDir: string;
  /** Final path segment of currentDir */
  dirName: string;
  /** Context window usage, undefined when not reported yet */
  contextPercent?: number;
  /** Session duration, 0 when absent */
  durationMs: number;
}

/** Everything render() needs to build a line. */
export interface RenderInput extends StatusFields {
  /** Current git branch, null outside a repository */
  branch: string | null;
  /** Rolling 5-hour utilization, null when unavailable */
  fiveHourPercent: number | null;
  /** Whether to render the 5h segment at all */
  showQuota?: boolean;
}

/** Emphasis level of a usage bar. */
export type UsageLevel = 'default' | 'warning' | 'danger';

// ---------------------------------------------------------------------------
// Usage API Types
// ---------------------------------------------------------------------------

/** Subset of the usage endpoint response we read. */
export interface UsageResponse {
  five_hour?: { utilization?: number | null; resets_at?: string | null } | null;
  seven_day?: { utilization?: number | null; resets_at?: string | null } | null;
}

/** A parsed usage cache with its age source. */
export interface UsageCacheEntry {
  body: UsageResponse;
  /** File modification time */
  mtimeMs: number;
}

// ---------------------------------------------------------------------------
// English Lesson Types
// ---------------------------------------------------------------------------

export type CorrectionCategory =
  | 'grammar'
  | 'vocabulary'
  | 'style'
  | 'spelling'
  | 'word_order';

export interface LessonCorrection {
  original: string;
  suggestion: string;
  category: CorrectionCategory;
  explanation: string;
}

export interface NotableExpression {
  expression: string;
  explanation: string;
}

/** Structured output the model returns for one prompt. */
export interface Lesson {
  enhanced_prompt: string;
  has_corrections: boolean;
  praise: string;
  corrections: LessonCorrection[];
  tip: string;
  is_korean_only: boolean;
  english_translation: string;
  notable_expressions: NotableExpression[];
}

/** A fully built request for the CLI. */
export interface LessonRequest {
  /** Coaching instructions with the user's prompt embedded */
  prompt: string;
  /** JSON schema text passed to --json-schema */
  schema: string;
  model: string;
}
