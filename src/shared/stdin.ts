/**
 * Read all of stdin as UTF-8. Resolves to '' when stdin is a TTY,
 * so running a hook by hand does not hang.
 */
export async function readStdin(
  stream: NodeJS.ReadStream = process.stdin
): Promise<string> {
  if (stream.isTTY) return '';

  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Parse hook input JSON. Returns undefined for empty or malformed input;
 * callers treat that as an empty event.
 */
export function parseJsonInput(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;
  try {
    return JSON.parse(trimmed) as unknown;
  } catch {
    return undefined;
  }
}
