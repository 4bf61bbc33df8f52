/**
 * OAuth Credentials
 *
 * Claude Code keeps its OAuth token in <config dir>/.credentials.json,
 * usually wrapped as { "claudeAiOauth": { "accessToken": ... } }.
 * CLAUDE_CONFIG_DIR overrides the default ~/.claude.
 */

import { homedir } from 'os';
import { join } from 'path';
import { readJsonFile } from '../state/index.js';
import { CredentialsFileSchema } from './schema.js';

export function getClaudeConfigDir(): string {
  return process.env.CLAUDE_CONFIG_DIR || join(homedir(), '.claude');
}

export function getCredentialsPath(): string {
  return join(getClaudeConfigDir(), '.credentials.json');
}

/**
 * Read the access token. Returns null when the file is missing or
 * malformed, the token is empty or "null", or it has expired.
 */
export function readAccessToken(
  path: string = getCredentialsPath(),
  now: number = Date.now()
): string | null {
  const { exists, data } = readJsonFile(path);
  if (!exists) return null;

  const parsed = CredentialsFileSchema.safeParse(data);
  if (!parsed.success) return null;

  const creds = 'claudeAiOauth' in parsed.data ? parsed.data.claudeAiOauth : parsed.data;
  const token = creds.accessToken;
  if (!token || token === 'null') return null;

  if (creds.expiresAt != null && creds.expiresAt <= now) return null;

  return token;
}
