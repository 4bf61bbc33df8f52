/**
 * HUD Renderer
 *
 * Each piece of the statusline is an "element": a pure function that takes
 * data and returns a string, or null when there is nothing to show. The
 * renderer collects elements in a fixed order and joins them:
 *
 *   Session: abc123 | proj (main) | Context: ▓▓▓▓░░░░░░ 45% | 5h limit: ▓▓░░░░░░░░ 23% | 1m 5s
 *
 * Usage bars are always present; with no data they render empty and
 * without a percentage.
 */

import type { RenderInput } from '../shared/types.js';
import { formatDuration, renderBar, usageLevel } from './bar.js';
import { colorForLevel } from './colors.js';

export const SEPARATOR = ' | ';

// ---------------------------------------------------------------------------
// Segment builder
// ---------------------------------------------------------------------------

/**
 * Collects labeled segments and joins the ones that are present.
 */
export class StatusLineBuilder {
  private readonly segments: string[] = [];

  add(segment: string | null): this {
    if (segment) this.segments.push(segment);
    return this;
  }

  build(separator: string = SEPARATOR): string {
    return this.segments.join(separator);
  }
}

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

export function renderSession(sessionName: string): string | null {
  return sessionName ? `Session: ${sessionName}` : null;
}

export function renderWorkspace(dirName: string, branch: string | null): string | null {
  if (!dirName) return null;
  return branch ? `${dirName} (${branch})` : dirName;
}

/**
 * A labeled usage bar. The whole segment takes the level's color.
 */
export function renderUsageBar(label: string, percent: number | null | undefined): string {
  if (percent === null || percent === undefined) {
    return `${label}: ${renderBar(0)}`;
  }
  const colorFn = colorForLevel(usageLevel(percent));
  return colorFn(`${label}: ${renderBar(percent)} ${percent}%`);
}

export function renderContext(usedPercentage: number | undefined): string {
  return renderUsageBar('Context', usedPercentage);
}

/** The quota percentage is shown as a whole number. */
export function renderFiveHour(utilization: number | null): string {
  return renderUsageBar('5h limit', utilization === null ? null : Math.trunc(utilization));
}

// ---------------------------------------------------------------------------
// Main render function
// ---------------------------------------------------------------------------

/**
 * Render the statusline. Always returns a non-empty line: the context bar
 * and duration are present even for an empty event.
 */
export function render(input: RenderInput): string {
  const builder = new StatusLineBuilder()
    .add(renderSession(input.sessionName))
    .add(renderWorkspace(input.dirName, input.branch))
    .add(renderContext(input.contextPercent));

  if (input.showQuota !== false) {
    builder.add(renderFiveHour(input.fiveHourPercent));
  }

  return builder.add(formatDuration(input.durationMs)).build();
}
