/**
 * Loads TOML documents from disk and converts them into the config value model.
 */

import * as fs from 'fs';
import * as path from 'path';
import TOML from '@ltd/j-toml';
import { parse as locateTomlError } from '@iarna/toml';
import type { TConfigTable, TConfigValue, TKeyPath } from './types.js';
import { formatKeyPath, hasKey } from './value.js';
import { DiffTomlError, getErrorMessage } from '../errors.js';
import { TOML_EXTENSIONS } from '../defaults.js';

/**
 * Text of a parsed datetime as it was written. Offset datetimes keep their
 * offset; local dates and times keep their short forms.
 */
function datetimeLiteral(raw: object): string | undefined {
  if (raw instanceof Date) return raw.toISOString();
  if (hasKey(raw, 'toISOString')) return undefined;
  if (!('toISOString' in raw) || typeof raw.toISOString !== 'function') return undefined;
  const text: unknown = raw.toISOString();
  return typeof text === 'string' ? text : undefined;
}

/**
 * Convert one value produced by the TOML parser. Integers arrive as bigint
 * and floats as number, so `1` and `1.0` stay distinct.
 */
export function toConfigValue(raw: unknown, keyPath: TKeyPath = []): TConfigValue {
  switch (typeof raw) {
    case 'string':
      return { kind: 'string', value: raw };
    case 'boolean':
      return { kind: 'boolean', value: raw };
    case 'number':
      return { kind: 'float', value: raw };
    case 'bigint':
      return { kind: 'integer', value: raw };
    case 'object': {
      if (raw === null) break;
      if (Array.isArray(raw)) {
        return {
          kind: 'array',
          items: raw.map((item: unknown, i) => toConfigValue(item, [...keyPath, String(i)])),
        };
      }
      const literal = datetimeLiteral(raw);
      if (literal !== undefined) return { kind: 'datetime', value: literal };
      return { kind: 'table', entries: toConfigTable(raw, keyPath) };
    }
  }
  throw new DiffTomlError(`Unsupported value at ${formatKeyPath(keyPath)}: ${String(raw)}`, 'ParseError');
}

function toConfigTable(raw: object, keyPath: TKeyPath): TConfigTable {
  return Object.fromEntries(
    Object.entries(raw).map(([key, value]: [string, unknown]): [string, TConfigValue] => [
      key,
      toConfigValue(value, [...keyPath, key]),
    ])
  );
}

interface TTomlErrorPosition {
  line?: number;
  column?: number;
}

/**
 * 1-based position of a syntax error. j-toml reports none, so the source is
 * re-read with @iarna/toml, whose errors carry 0-based `line`/`col` fields.
 */
function errorPosition(text: string): TTomlErrorPosition {
  try {
    locateTomlError(text);
  } catch (error) {
    if (typeof error !== 'object' || error === null) return {};
    const position: TTomlErrorPosition = {};
    if ('line' in error && typeof error.line === 'number') position.line = error.line + 1;
    if ('col' in error && typeof error.col === 'number') position.column = error.col + 1;
    return position;
  }
  return {};
}

/**
 * Parse TOML source text. `source` names the document in error messages.
 */
export function parseConfigText(text: string, source = '<input>'): TConfigTable {
  let document: unknown;
  try {
    document = TOML.parse(text, 1.0, '\n', true);
  } catch (error) {
    const { line, column } = errorPosition(text);
    const firstLine = getErrorMessage(error).split('\n')[0];
    throw new DiffTomlError(`Failed to parse ${source}: ${firstLine}`, 'ParseError', {
      file: source,
      line,
      column,
      cause: error,
    });
  }

  const root = toConfigValue(document);
  if (root.kind !== 'table') {
    throw new DiffTomlError(`Failed to parse ${source}: document root is not a table`, 'ParseError', {
      file: source,
    });
  }
  return root.entries;
}

/**
 * Read and parse a TOML file. Fails with FileNotFound, InvalidArgument
 * (directory or wrong extension), IoError or ParseError.
 */
export function readConfigFile(filePath: string): TConfigTable {
  const resolved = path.resolve(filePath);

  if (!fs.existsSync(resolved)) {
    throw new DiffTomlError(`File not found: ${filePath}`, 'FileNotFound', { file: filePath });
  }
  if (!fs.statSync(resolved).isFile()) {
    throw new DiffTomlError(`Not a file: ${filePath}`, 'InvalidArgument', { file: filePath });
  }
  if (!TOML_EXTENSIONS.includes(path.extname(resolved).toLowerCase())) {
    throw new DiffTomlError(`Not a TOML file: ${filePath}`, 'InvalidArgument', { file: filePath });
  }

  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new DiffTomlError(`Failed to read ${filePath}: ${getErrorMessage(error)}`, 'IoError', {
      file: filePath,
      cause: error,
    });
  }

  return parseConfigText(text, filePath);
}
