/**
 * Debug channel
 *
 * Hooks must never block Claude Code, so every external failure falls back
 * silently. When debugging is on, each fallback leaves one line on stderr:
 *
 *   [usage] fetch failed: HTTP 401
 *
 * stdout stays untouched, so the statusline keeps rendering.
 */

export type DebugLogger = (message: string, err?: unknown) => void;

/** Describe an unknown thrown value in one line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Create a logger that prefixes messages with a tag.
 * A disabled logger is a no-op.
 */
export function createDebugLogger(
  tag: string,
  enabled: boolean,
  write: (line: string) => void = (line) => console.error(line)
): DebugLogger {
  if (!enabled) {
    return () => {};
  }
  return (message, err) => {
    const suffix = err === undefined ? '' : `: ${describeError(err)}`;
    write(`[${tag}] ${message}${suffix}`);
  };
}
