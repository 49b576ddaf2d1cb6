/**
 * Default configuration values for difftoml
 */

import type { TDiffOptions } from './diff/types.js';

export const VERSION = '0.1.0';

/**
 * Nesting depth at which the differ gives up with a TooDeep error
 * instead of exhausting the call stack.
 */
export const DEFAULT_MAX_DEPTH = 1000;

/** Extensions accepted for input documents */
export const TOML_EXTENSIONS: readonly string[] = ['.toml'];

export const DEFAULT_DIFF_OPTIONS: Required<TDiffOptions> = {
  exclude: [],
  includeEqual: false,
  maxDepth: DEFAULT_MAX_DEPTH,
};

/** NO_COLOR (https://no-color.org) wins over any --color flag */
export function isColorDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.NO_COLOR);
}
