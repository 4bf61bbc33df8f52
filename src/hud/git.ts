/**
 * Git branch lookup for the workspace segment.
 */

import { execFileSync } from 'child_process';
import type { DebugLogger } from '../shared/debug.js';

const GIT_TIMEOUT_MS = 2000;

/** Runs git with the given arguments and returns stdout; throws on failure. */
export type GitRunner = (args: string[]) => string;

export const runGit: GitRunner = (args) =>
  execFileSync('git', args, {
    encoding: 'utf-8',
    timeout: GIT_TIMEOUT_MS,
    stdio: ['ignore', 'pipe', 'ignore'],
  });

/**
 * Current branch of the repository containing dir.
 * Returns null outside a repository, on a detached HEAD, or when git
 * itself is missing or times out.
 */
export function getGitBranch(
  dir: string,
  run: GitRunner = runGit,
  debug: DebugLogger = () => {}
): string | null {
  if (!dir) return null;
  try {
    const branch = run(['-C', dir, 'branch', '--show-current']).trim();
    return branch || null;
  } catch (err) {
    debug(`no git branch for ${dir}`, err);
    return null;
  }
}
