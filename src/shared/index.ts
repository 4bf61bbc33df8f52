/**
 * Shared Module
 *
 * Hook plumbing used by every entry point.
 */

export { createDebugLogger, describeError } from './debug.js';
export type { DebugLogger } from './debug.js';
export { readStdin, parseJsonInput } from './stdin.js';
