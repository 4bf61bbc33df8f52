/**
 * Usage bars and thresholds.
 */

import type { UsageLevel } from '../shared/types.js';

export const BAR_WIDTH = 10;
export const FILLED = '▓';
export const EMPTY = '░';

export const WARNING_THRESHOLD = 75;
export const DANGER_THRESHOLD = 90;

/** Clamp to [0, 100]; NaN and infinities become 0. */
export function clampPercent(p: number): number {
  if (!Number.isFinite(p)) return 0;
  return Math.min(100, Math.max(0, p));
}

/**
 * Render a 10-glyph bar. The filled count is floored, never rounded:
 *
 *   renderBar(45)  → ▓▓▓▓░░░░░░
 *   renderBar(99)  → ▓▓▓▓▓▓▓▓▓░
 */
export function renderBar(p: number): string {
  const filled = Math.floor((clampPercent(p) * BAR_WIDTH) / 100);
  return FILLED.repeat(filled) + EMPTY.repeat(BAR_WIDTH - filled);
}

/**
 * default below 75, warning in [75, 90), danger from 90.
 */
export function usageLevel(p: number): UsageLevel {
  if (p >= DANGER_THRESHOLD) return 'danger';
  if (p >= WARNING_THRESHOLD) return 'warning';
  return 'default';
}

/**
 * Whole minutes and seconds, no hour rollover: 3661000 → "61m 1s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Number.isFinite(ms) && ms > 0 ? Math.floor(ms / 1000) : 0;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}m ${seconds}s`;
}
