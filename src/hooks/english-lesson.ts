/**
 * English Lesson Hook Logic
 *
 * Pure functions that turn a user prompt into a coaching request, and the
 * model's structured answer into the lesson banner. No process I/O here:
 * lesson-runner.ts calls the CLI and cli/english-lesson.ts owns stdin/stdout.
 *
 * Templates live in templates/ at the package root so the coaching
 * instructions can be edited without touching code.
 */

import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { readTextFile } from '../state/index.js';
import type {
  Lesson,
  LessonCorrection,
  LessonRequest,
  NotableExpression,
  SystemMessageOutput,
} from '../shared/types.js';

// ---------------------------------------------------------------------------
// Structured output
// ---------------------------------------------------------------------------

export const LessonSchema = z.object({
  enhanced_prompt: z.string(),
  has_corrections: z.boolean(),
  praise: z.string(),
  corrections: z.array(
    z.object({
      original: z.string(),
      suggestion: z.string(),
      category: z.enum(['grammar', 'vocabulary', 'style', 'spelling', 'word_order']),
      explanation: z.string(),
    })
  ),
  tip: z.string(),
  is_korean_only: z.boolean(),
  english_translation: z.string(),
  notable_expressions: z.array(
    z.object({
      expression: z.string(),
      explanation: z.string(),
    })
  ),
});

const CliResponseSchema = z.object({
  structured_output: z.unknown(),
});

/**
 * Extract the lesson from the CLI's --output-format json response.
 * Returns null if stdout isn't JSON or structured_output is missing
 * or doesn't match the schema.
 */
export function parseLessonResponse(stdout: string): Lesson | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    return null;
  }

  const response = CliResponseSchema.safeParse(raw);
  if (!response.success) return null;

  const lesson = LessonSchema.safeParse(response.data.structured_output);
  return lesson.success ? lesson.data : null;
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export const PROMPT_TEMPLATE_FILE = 'english-lesson-prompt.md';
export const SCHEMA_TEMPLATE_FILE = 'english-lesson-schema.json';

export function getTemplatesDir(): string {
  return fileURLToPath(new URL('../../templates/', import.meta.url));
}

function fill(template: string, values: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(values)) {
    result = result.split(`{{${key}}}`).join(value);
  }
  return result;
}

export interface LessonRequestOptions {
  targetLanguage: string;
  model: string;
  templatesDir?: string;
}

/**
 * Build the CLI request for one prompt. Throws if a template is missing or
 * the filled schema is not valid JSON; both mean a broken install.
 */
export function buildLessonRequest(
  prompt: string,
  { targetLanguage, model, templatesDir = getTemplatesDir() }: LessonRequestOptions
): LessonRequest {
  const promptTemplate = readTextFile(join(templatesDir, PROMPT_TEMPLATE_FILE));
  const schemaTemplate = readTextFile(join(templatesDir, SCHEMA_TEMPLATE_FILE));
  if (promptTemplate.data === undefined || schemaTemplate.data === undefined) {
    throw new Error(`Lesson templates not found in ${templatesDir}`);
  }

  // Inside the schema the language lands in JSON strings, so escape it.
  const schemaLanguage = JSON.stringify(targetLanguage).slice(1, -1);
  const schema: unknown = JSON.parse(
    fill(schemaTemplate.data, { TARGET_LANGUAGE: schemaLanguage })
  );

  return {
    // Language first: a prompt that happens to contain a placeholder stays as typed.
    prompt: fill(fill(promptTemplate.data, { TARGET_LANGUAGE: targetLanguage }), {
      PROMPT: prompt,
    }),
    schema: JSON.stringify(schema),
    model,
  };
}

/**
 * Arguments for a one-shot, schema-constrained CLI call.
 */
export function buildCliArgs(request: LessonRequest): string[] {
  return [
    '--model',
    request.model,
    '--output-format',
    'json',
    '--no-session-persistence',
    '--json-schema',
    request.schema,
    '-p',
    request.prompt,
  ];
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export const LESSON_FAILED = 'Failed to generate lesson.';

const LABELS = {
  corrections: '✨ 더 자연스러운 표현',
  expressions: '📝 사용된 표현',
  // Already-fine layout only.
  praisedExpressions: '📝 [사용된 표현]',
};

const BANNER_TITLE = '★ English Lesson ';
const HEADER_RULE = '─'.repeat(32);
const FOOTER_RULE = '─'.repeat(49);

export function formatCorrections(corrections: LessonCorrection[]): string {
  return corrections
    .map(
      (c) =>
        `[${c.category}]\n"${c.original}"\n→ "${c.suggestion}"\n♫ ${c.explanation}`
    )
    .join('\n\n');
}

export function formatExpressions(expressions: NotableExpression[]): string {
  return expressions
    .map((e) => `"${e.expression}"\n→ ${e.explanation}`)
    .join('\n\n');
}

/**
 * Lay out a lesson. Three shapes:
 *   - prompt written only in the target language → its English translation
 *   - prompt with corrections → the improved prompt and the corrections
 *   - already fine → praise, expressions and tip only
 *
 * The original prompt is shown JSON-quoted.
 */
export function formatLesson(originalPrompt: string, lesson: Lesson | null): string {
  if (!lesson) return LESSON_FAILED;

  const original = `🧙 ${JSON.stringify(originalPrompt)}`;
  const expressionList = formatExpressions(lesson.notable_expressions);
  const expressions = `${LABELS.expressions}\n${expressionList}`;
  const tip = `💡 ${lesson.tip}`;
  const corrections = `${LABELS.corrections}\n${formatCorrections(lesson.corrections)}`;

  const translated = lesson.is_korean_only && lesson.english_translation !== '';

  if (!translated && !lesson.has_corrections) {
    const praised = `${LABELS.praisedExpressions}\n${expressionList}`;
    return [`👍 "${lesson.praise}"`, original, praised, tip].join('\n\n');
  }

  const rewritten = translated ? lesson.english_translation : lesson.enhanced_prompt;
  const sections = [`🤖 "${lesson.praise}"`, `${original}\n→ ${rewritten}`];
  if (lesson.has_corrections) {
    sections.push(corrections);
  }
  sections.push(expressions, tip);
  return sections.join('\n\n');
}

/**
 * Wrap lesson text in the banner shown in the terminal.
 */
export function formatBanner(text: string): string {
  return `\n${BANNER_TITLE}${HEADER_RULE}\n${text}\n${FOOTER_RULE}`;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as "YYYY-MM-DD HH:MM". */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/** One lesson log entry, preceded by a blank line. */
export function formatLogEntry(text: string, date: Date): string {
  return `\n[${formatLogTimestamp(date)}]\n${text}\n`;
}

/**
 * The hook output: shown to the user, never added to the model's context.
 */
export function buildSystemMessageOutput(text: string): SystemMessageOutput {
  return { systemMessage: formatBanner(text) };
}
