/**
 * HUD Entry Point
 *
 * The statusline pipeline:
 *   1. Read JSON from stdin (session, workspace, context window, cost)
 *   2. Parse it into StatusFields
 *   3. Add the git branch and the cached 5h utilization
 *   4. render() one colored line to stdout
 *
 * Claude Code calls this on every refresh via the statusLine command
 * configured in ~/.claude/settings.json.
 */

export {
  render,
  renderSession,
  renderWorkspace,
  renderUsageBar,
  renderContext,
  renderFiveHour,
  StatusLineBuilder,
  SEPARATOR,
} from './render.js';
export {
  renderBar,
  usageLevel,
  clampPercent,
  formatDuration,
  BAR_WIDTH,
  FILLED,
  EMPTY,
} from './bar.js';
export { yellow, red, colorForLevel, RESET } from './colors.js';
export { getGitBranch, runGit } from './git.js';
export type { GitRunner } from './git.js';
export {
  parseStatuslineInput,
  toStatusFields,
  sessionName,
  dirDisplayName,
  StatuslineInputSchema,
} from './status-event.js';
export { runStatusline, renderFallback } from './statusline.js';
export type { StatuslineDeps } from './statusline.js';
