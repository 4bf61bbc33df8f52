/**
 * English lesson hook: runs the CLI and writes the log.
 *
 * The nested `claude -p` call fires UserPromptSubmit again, so it runs with
 * REWRITER_LOCK=1 and the hook does nothing while that variable is set.
 */

import { execFile } from 'child_process';
import { resolveLessonSettings } from '../config/index.js';
import { createDebugLogger } from '../shared/debug.js';
import type { DebugLogger } from '../shared/debug.js';
import { parseJsonInput } from '../shared/stdin.js';
import type {
  Lesson,
  LessonRequest,
  PluginConfig,
  PromptHookInput,
  StateWriteResult,
  SystemMessageOutput,
} from '../shared/types.js';
import { appendTextFile } from '../state/index.js';
import {
  buildCliArgs,
  buildLessonRequest,
  buildSystemMessageOutput,
  formatLesson,
  formatLogEntry,
  parseLessonResponse,
} from './english-lesson.js';

export const LOCK_ENV = 'REWRITER_LOCK';

/** Runs the CLI for a request; resolves to stdout, or null on failure. */
export type LessonRunner = (request: LessonRequest) => Promise<string | null>;

export function createCliRunner(
  timeoutMs: number,
  debug: DebugLogger = () => {},
  command = 'claude'
): LessonRunner {
  return (request) =>
    new Promise((resolve) => {
      execFile(
        command,
        buildCliArgs(request),
        {
          env: { ...process.env, [LOCK_ENV]: '1' },
          timeout: timeoutMs,
          maxBuffer: 4 * 1024 * 1024,
        },
        (err, stdout) => {
          if (err) {
            debug(`${command} failed`, err);
            resolve(null);
            return;
          }
          resolve(stdout);
        }
      );
    });
}

/**
 * Run one request and validate the answer. Null when the CLI failed or
 * returned no usable structured_output.
 */
export async function requestLesson(
  request: LessonRequest,
  runner: LessonRunner,
  debug: DebugLogger = () => {}
): Promise<Lesson | null> {
  const stdout = await runner(request);
  if (stdout === null) return null;
  const lesson = parseLessonResponse(stdout);
  if (!lesson) {
    debug('CLI response had no valid structured_output');
  }
  return lesson;
}

/** Append one timestamped entry, creating the log directory. */
export function appendLessonLog(text: string, path: string, now: Date): StateWriteResult {
  return appendTextFile(path, formatLogEntry(text, now));
}

function readPrompt(raw: unknown): PromptHookInput['prompt'] {
  if (typeof raw !== 'object' || raw === null || !('prompt' in raw)) return undefined;
  const prompt: unknown = raw.prompt;
  return typeof prompt === 'string' ? prompt : undefined;
}

export interface LessonHookDeps {
  runner?: LessonRunner;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  templatesDir?: string;
  debug?: DebugLogger;
}

/**
 * Run the hook for one stdin payload. Returns null when there is nothing
 * to print: inside the nested call, hook disabled, or an empty prompt.
 */
export async function processEnglishLesson(
  rawInput: string,
  config: PluginConfig,
  deps: LessonHookDeps = {}
): Promise<SystemMessageOutput | null> {
  const env = deps.env ?? process.env;
  if (env[LOCK_ENV]) return null;

  const settings = resolveLessonSettings(config);
  if (!settings.enabled) return null;

  const debug = deps.debug ?? createDebugLogger('english-lesson', config.debug === true);

  const prompt = readPrompt(parseJsonInput(rawInput)) ?? '';
  if (!prompt.trim()) {
    debug('no prompt in hook input');
    return null;
  }

  let text: string;
  try {
    const request = buildLessonRequest(prompt, {
      targetLanguage: settings.targetLanguage,
      model: settings.model,
      templatesDir: deps.templatesDir,
    });
    const runner = deps.runner ?? createCliRunner(settings.timeoutMs, debug);
    text = formatLesson(prompt, await requestLesson(request, runner, debug));
  } catch (err) {
    debug('could not build lesson request', err);
    text = formatLesson(prompt, null);
  }

  const now = deps.now ?? (() => new Date());
  const logged = appendLessonLog(text, settings.logPath, now());
  if (!logged.success) {
    debug(`lesson log write failed for ${logged.path}: ${logged.error ?? 'unknown error'}`);
  }

  return buildSystemMessageOutput(text);
}
