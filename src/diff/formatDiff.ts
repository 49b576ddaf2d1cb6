/**
 * Human-readable formatter for config diffs.
 */

import { formatConfigValue, formatKeyPath } from '../config/value.js';
import type { TConfigDiff, TDiffRecord, TDiffRecordType } from './types.js';

export interface TFormatOptions {
  /** Name shown for the left document */
  leftLabel: string;
  /** Name shown for the right document */
  rightLabel: string;
  /** Wrap lines in ANSI color codes */
  color?: boolean;
}

const RESET = '\x1b[0m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const DIM = '\x1b[2m';

type TPaint = (text: string, code: string) => string;

function recordsOf<T extends TDiffRecordType>(
  diff: TConfigDiff,
  type: T
): Array<Extract<TDiffRecord, { type: T }>> {
  return diff.records.filter((r): r is Extract<TDiffRecord, { type: T }> => r.type === type);
}

/**
 * Format a config diff for display.
 *
 * Groups, in order: entries only in the left file, entries only in the right
 * file, unequal values, equal values. Each group starts with an empty line and
 * is left out when it has no records.
 */
export function formatDiff(diff: TConfigDiff, options: TFormatOptions): string {
  const paint: TPaint = options.color ? (text, code) => `${code}${text}${RESET}` : (text) => text;
  const lines: string[] = [];

  const onlyInLeft = recordsOf(diff, 'ONLY_IN_LEFT');
  if (onlyInLeft.length > 0) {
    lines.push('');
    lines.push(paint(`Entries only found in ${options.leftLabel}`, RED));
    for (const record of onlyInLeft) {
      lines.push(paint(`${formatKeyPath(record.path)}: ${formatConfigValue(record.value)}`, RED));
    }
  }

  const onlyInRight = recordsOf(diff, 'ONLY_IN_RIGHT');
  if (onlyInRight.length > 0) {
    lines.push('');
    lines.push(paint(`Entries only found in ${options.rightLabel}`, GREEN));
    for (const record of onlyInRight) {
      lines.push(paint(`${formatKeyPath(record.path)}: ${formatConfigValue(record.value)}`, GREEN));
    }
  }

  const unequal = recordsOf(diff, 'UNEQUAL');
  if (unequal.length > 0) {
    lines.push('');
    for (const record of unequal) {
      lines.push(paint(`Unequal value for key ${formatKeyPath(record.path)}`, YELLOW));
      lines.push(paint(`<: ${formatConfigValue(record.left)}`, RED));
      lines.push(paint(`>: ${formatConfigValue(record.right)}`, GREEN));
    }
  }

  const equal = recordsOf(diff, 'EQUAL');
  if (equal.length > 0) {
    lines.push('');
    for (const record of equal) {
      const value = formatConfigValue(record.value);
      lines.push(paint(`Equal value for key ${formatKeyPath(record.path)}`, DIM));
      lines.push(`<: ${value}`);
      lines.push(`>: ${value}`);
    }
  }

  return lines.join('\n');
}
