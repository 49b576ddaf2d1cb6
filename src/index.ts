/**
 * difftoml - compare two TOML documents key by key
 */

export * from './config/types.js';
export { configValueEquals, formatConfigValue, formatKeyPath, isTable } from './config/value.js';
export { parseConfigText, readConfigFile, toConfigValue } from './config/parse.js';
export * from './diff/index.js';
export { DiffTomlError } from './errors.js';
export type { TDiffTomlErrorKind, TDiffTomlErrorDetails } from './errors.js';
export { DEFAULT_DIFF_OPTIONS, DEFAULT_MAX_DEPTH } from './defaults.js';
