/**
 * Statusline pipeline
 *
 *   1. Parse the JSON Claude Code pipes in
 *   2. Look up the git branch of the workspace
 *   3. Get the rolling 5-hour utilization (cached)
 *   4. Render one line
 *
 * Every external call is injectable; the defaults hit git, the credentials
 * file and the usage endpoint for real.
 */

import { DEFAULT_CONFIG, resolveStatuslineSettings } from '../config/index.js';
import { createDebugLogger, parseJsonInput } from '../shared/index.js';
import type { DebugLogger } from '../shared/index.js';
import type { PluginConfig } from '../shared/types.js';
import {
  createUsageFetcher,
  getFiveHourUtilization,
  readAccessToken,
} from '../usage/index.js';
import type { UsageFetcher } from '../usage/index.js';
import { getGitBranch, runGit } from './git.js';
import type { GitRunner } from './git.js';
import { render } from './render.js';
import { parseStatuslineInput, toStatusFields } from './status-event.js';

export interface StatuslineDeps {
  git?: GitRunner;
  fetchUsage?: UsageFetcher;
  readToken?: () => string | null;
  now?: () => number;
  debug?: DebugLogger;
}

export async function runStatusline(
  rawInput: string,
  config: PluginConfig = DEFAULT_CONFIG,
  deps: StatuslineDeps = {}
): Promise<string> {
  const settings = resolveStatuslineSettings(config);
  const debug = deps.debug ?? createDebugLogger('statusline', config.debug === true);

  const raw = parseJsonInput(rawInput);
  if (raw === undefined && rawInput.trim()) {
    debug('stdin is not valid JSON, rendering an empty event');
  }
  const fields = toStatusFields(parseStatuslineInput(raw));

  const branch = settings.showBranch
    ? getGitBranch(fields.currentDir, deps.git ?? runGit, debug)
    : null;

  let fiveHourPercent: number | null = null;
  if (settings.showQuota) {
    const fetchUsage =
      deps.fetchUsage ??
      createUsageFetcher({
        endpoint: settings.usageEndpoint,
        timeoutMs: settings.fetchTimeoutMs,
      });

    fiveHourPercent = await getFiveHourUtilization(
      {
        cachePath: settings.cachePath,
        maxAgeMs: settings.cacheMaxAgeSeconds * 1000,
      },
      {
        fetchUsage,
        readToken: deps.readToken ?? (() => readAccessToken()),
        now: deps.now,
        debug: deps.debug ?? createDebugLogger('usage', config.debug === true),
      }
    );
  }

  return render({
    ...fields,
    branch,
    fiveHourPercent,
    showQuota: settings.showQuota,
  });
}

/**
 * Fallback line when the pipeline itself blew up: the empty event,
 * without touching git or the network.
 */
export function renderFallback(): string {
  return render({
    ...toStatusFields({}),
    branch: null,
    fiveHourPercent: null,
  });
}
