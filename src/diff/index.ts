/**
 * Key-by-key diff of TOML documents.
 * @module diff
 */

export * from './types.js';
export { ConfigDiffer } from './ConfigDiffer.js';
export { formatDiff } from './formatDiff.js';
export type { TFormatOptions } from './formatDiff.js';
