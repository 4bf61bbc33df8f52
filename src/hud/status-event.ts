/**
 * Status event parsing
 *
 * Claude Code's statusline payload is undocumented and changes between
 * releases, so every field is optional and a field of the wrong type is
 * dropped on its own instead of rejecting the whole event.
 */

import { z } from 'zod';
import type { StatusFields, StatuslineInput } from '../shared/types.js';

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().nullable().optional().catch(undefined);

export const StatuslineInputSchema = z
  .object({
    session_id: optionalString,
    workspace: z
      .object({ current_dir: optionalString })
      .optional()
      .catch(undefined),
    context_window: z
      .object({ used_percentage: optionalNumber })
      .optional()
      .catch(undefined),
    cost: z
      .object({ total_duration_ms: optionalNumber })
      .optional()
      .catch(undefined),
  })
  .catch({});

/**
 * Validate raw stdin JSON into a StatuslineInput. Never throws;
 * non-objects become an empty event.
 */
export function parseStatuslineInput(raw: unknown): StatuslineInput {
  const parsed = StatuslineInputSchema.parse(raw);
  return {
    session_id: parsed.session_id,
    workspace: parsed.workspace,
    context_window: parsed.context_window,
    cost: {
      total_duration_ms: parsed.cost?.total_duration_ms ?? undefined,
    },
  };
}

/** "abc123.jsonl" → "abc123". */
export function sessionName(sessionId: string | undefined): string {
  if (!sessionId) return '';
  return sessionId.endsWith('.jsonl') ? sessionId.slice(0, -'.jsonl'.length) : sessionId;
}

/** Final path segment, ignoring trailing slashes: "/home/u/proj/" → "proj". */
export function dirDisplayName(currentDir: string | undefined): string {
  if (!currentDir) return '';
  const trimmed = currentDir.replace(/[\\/]+$/, '');
  const segments = trimmed.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

/**
 * Derive the fields the renderer needs, applying defaults.
 */
export function toStatusFields(input: StatuslineInput): StatusFields {
  const used = input.context_window?.used_percentage;
  const duration = input.cost?.total_duration_ms;
  const currentDir = input.workspace?.current_dir ?? '';

  return {
    sessionName: sessionName(input.session_id),
    currentDir,
    dirName: dirDisplayName(currentDir),
    contextPercent: typeof used === 'number' && Number.isFinite(used) ? used : undefined,
    durationMs: typeof duration === 'number' && Number.isFinite(duration) && duration > 0 ? duration : 0,
  };
}
