/**
 * ConfigDiffer - key-by-key diff of two parsed TOML documents.
 * Walks both trees in lockstep and reports leaf-level differences.
 */

import type { TConfigTable, TConfigValue, TKeyPath } from '../config/types.js';
import { configValueEquals, hasKey, isTable } from '../config/value.js';
import { DiffTomlError } from '../errors.js';
import { DEFAULT_DIFF_OPTIONS } from '../defaults.js';
import type { TConfigDiff, TDiffOptions, TDiffRecord } from './types.js';

interface TWalkContext {
  exclude: ReadonlySet<string>;
  includeEqual: boolean;
  maxDepth: number;
  records: TDiffRecord[];
}

/**
 * Left keys in document order, then right keys the left table lacks
 */
function unionKeys(left: TConfigTable, right: TConfigTable): string[] {
  const keys = Object.keys(left);
  for (const key of Object.keys(right)) {
    if (!hasKey(left, key)) keys.push(key);
  }
  return keys;
}

/**
 * Drop excluded key names from a value reported whole, including tables
 * nested in arrays
 */
function withoutExcluded(value: TConfigValue, exclude: ReadonlySet<string>): TConfigValue {
  if (exclude.size === 0) return value;
  switch (value.kind) {
    case 'table':
      return {
        kind: 'table',
        entries: Object.fromEntries(
          Object.entries(value.entries)
            .filter(([key]) => !exclude.has(key))
            .map(([key, entry]): [string, TConfigValue] => [key, withoutExcluded(entry, exclude)])
        ),
      };
    case 'array':
      return { kind: 'array', items: value.items.map((item) => withoutExcluded(item, exclude)) };
    default:
      return value;
  }
}

function walk(left: TConfigTable, right: TConfigTable, parent: TKeyPath, ctx: TWalkContext): void {
  if (parent.length > ctx.maxDepth) {
    throw new DiffTomlError(`Tables are nested deeper than ${ctx.maxDepth} levels`, 'TooDeep');
  }

  for (const key of unionKeys(left, right)) {
    if (ctx.exclude.has(key)) continue;

    const path = [...parent, key];
    const inLeft = hasKey(left, key);
    const inRight = hasKey(right, key);

    if (!inRight) {
      ctx.records.push({ type: 'ONLY_IN_LEFT', path, value: withoutExcluded(left[key], ctx.exclude) });
      continue;
    }
    if (!inLeft) {
      ctx.records.push({ type: 'ONLY_IN_RIGHT', path, value: withoutExcluded(right[key], ctx.exclude) });
      continue;
    }

    const leftValue = left[key];
    const rightValue = right[key];

    if (isTable(leftValue) && isTable(rightValue)) {
      walk(leftValue.entries, rightValue.entries, path, ctx);
    } else if (!configValueEquals(leftValue, rightValue)) {
      ctx.records.push({ type: 'UNEQUAL', path, left: leftValue, right: rightValue });
    } else if (ctx.includeEqual) {
      ctx.records.push({ type: 'EQUAL', path, value: leftValue });
    }
  }
}

export class ConfigDiffer {
  /**
   * Compare two documents and return the ordered diff records
   */
  static compare(left: TConfigTable, right: TConfigTable, options: TDiffOptions = {}): TConfigDiff {
    const ctx: TWalkContext = {
      exclude: new Set<string>(options.exclude ?? DEFAULT_DIFF_OPTIONS.exclude),
      includeEqual: options.includeEqual ?? DEFAULT_DIFF_OPTIONS.includeEqual,
      maxDepth: options.maxDepth ?? DEFAULT_DIFF_OPTIONS.maxDepth,
      records: [],
    };

    walk(left, right, [], ctx);

    const { records } = ctx;
    const summary = {
      onlyInLeft: records.filter((r) => r.type === 'ONLY_IN_LEFT').length,
      onlyInRight: records.filter((r) => r.type === 'ONLY_IN_RIGHT').length,
      unequal: records.filter((r) => r.type === 'UNEQUAL').length,
      equal: records.filter((r) => r.type === 'EQUAL').length,
    };

    return {
      identical: summary.onlyInLeft === 0 && summary.onlyInRight === 0 && summary.unequal === 0,
      summary,
      records,
    };
  }
}
