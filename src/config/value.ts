/**
 * Structural equality and textual rendering for config values.
 */

import type { TConfigTable, TConfigValue, TKeyPath } from './types.js';

const BARE_KEY = /^[A-Za-z0-9_-]+$/;

export function isTable(
  value: TConfigValue | undefined
): value is Extract<TConfigValue, { kind: 'table' }> {
  return value?.kind === 'table';
}

export function hasKey(table: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function tableEquals(a: TConfigTable, b: TConfigTable): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => hasKey(b, key) && configValueEquals(a[key], b[key]));
}

/**
 * Structural equality. Values of different kinds are never equal, so
 * integer 1 and float 1.5 differ by kind before their numbers are looked at.
 * NaN floats are equal to each other. Datetimes compare by their written
 * text, so the same instant under two offsets is unequal.
 */
export function configValueEquals(a: TConfigValue, b: TConfigValue): boolean {
  switch (a.kind) {
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'integer':
      // number and bigint compare by value with ==
      // eslint-disable-next-line eqeqeq
      return b.kind === 'integer' && a.value == b.value;
    case 'float':
      return b.kind === 'float' && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case 'datetime':
      return b.kind === 'datetime' && a.value === b.value;
    case 'array':
      return (
        b.kind === 'array' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => configValueEquals(item, b.items[i]))
      );
    case 'table':
      return b.kind === 'table' && tableEquals(a.entries, b.entries);
  }
}

function formatString(value: string): string {
  return JSON.stringify(value);
}

function formatKey(key: string): string {
  return BARE_KEY.test(key) ? key : formatString(key);
}

function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  const text = String(value);
  return Number.isInteger(value) && !text.includes('e') ? `${text}.0` : text;
}

/**
 * Render a value the way it would be written in TOML: strings quoted,
 * numbers bare, arrays bracketed, tables as inline tables.
 */
export function formatConfigValue(value: TConfigValue): string {
  switch (value.kind) {
    case 'string':
      return formatString(value.value);
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'datetime':
      return value.value;
    case 'array':
      return `[${value.items.map(formatConfigValue).join(', ')}]`;
    case 'table': {
      const entries = Object.entries(value.entries);
      if (entries.length === 0) return '{}';
      return `{ ${entries.map(([k, v]) => `${formatKey(k)} = ${formatConfigValue(v)}`).join(', ')} }`;
    }
  }
}

/**
 * Render a key path as a list of quoted segments, e.g. `["field1", "name"]`.
 */
export function formatKeyPath(path: TKeyPath): string {
  return `[${path.map(formatString).join(', ')}]`;
}
