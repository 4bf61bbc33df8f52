/**
 * ANSI color helpers for statusline output.
 *
 * Each color wraps the whole string and resets at the end, so a colored
 * segment never bleeds into the separator that follows it.
 */

import type { UsageLevel } from '../shared/types.js';

export const RESET = '\x1b[0m';

export const yellow = (s: string): string => `\x1b[33m${s}${RESET}`;
export const red = (s: string): string => `\x1b[31m${s}${RESET}`;

/**
 * Color for a usage level. Default usage stays uncolored.
 */
export function colorForLevel(level: UsageLevel): (s: string) => string {
  switch (level) {
    case 'danger':
      return red;
    case 'warning':
      return yellow;
    default:
      return (s) => s;
  }
}
