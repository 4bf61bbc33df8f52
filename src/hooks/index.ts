/**
 * Hooks Module
 *
 * UserPromptSubmit: English lesson banner for every prompt.
 */

export {
  LessonSchema,
  parseLessonResponse,
  buildLessonRequest,
  buildCliArgs,
  getTemplatesDir,
  formatLesson,
  formatCorrections,
  formatExpressions,
  formatBanner,
  formatLogEntry,
  formatLogTimestamp,
  buildSystemMessageOutput,
  LESSON_FAILED,
} from './english-lesson.js';
export type { LessonRequestOptions } from './english-lesson.js';
export {
  processEnglishLesson,
  requestLesson,
  appendLessonLog,
  createCliRunner,
  LOCK_ENV,
} from './lesson-runner.js';
export type { LessonRunner, LessonHookDeps } from './lesson-runner.js';
