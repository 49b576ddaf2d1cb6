/**
 * ConfigDiffer tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigDiffer } from '../../../src/diff/ConfigDiffer.js';
import type { TDiffRecord } from '../../../src/diff/types.js';
import type { TConfigTable } from '../../../src/config/types.js';
import { DiffTomlError } from '../../../src/errors.js';
import { toml } from '../../helpers/fixtures.js';

function pathsOf(records: TDiffRecord[], type: TDiffRecord['type']): string[][] {
  return records.filter((r) => r.type === type).map((r) => [...r.path]);
}

const LEFT = toml(`
  id = "left"
  name = "app"
  retries = 3
  tags = ["a", "b"]

  [database]
  id = 1
  host = "db.local"
  pool = 10

  [database.replica]
  host = "replica.local"

  [logging]
  level = "info"
`);

const RIGHT = toml(`
  id = "right"
  name = "app"
  retries = 5
  tags = ["a", "b"]
  timeout = 30

  [database]
  id = 2
  host = "db.internal"
  pool = 10

  [database.replica]
  host = "replica.local"
  lag = 2

  [metrics]
  enabled = true
`);

describe('ConfigDiffer', () => {
  describe('compare', () => {
    it('should report the two unequal keys of the values scenario', () => {
      const left = toml(`
        name = "first"
        [field0]
        values = [0.12, 3.45, 6.78]
      `);
      const right = toml(`
        name = "second"
        [field0]
        values = [0.123, 3.456, 6.789]
      `);

      const diff = ConfigDiffer.compare(left, right);

      expect(diff.records).toEqual([
        {
          type: 'UNEQUAL',
          path: ['name'],
          left: { kind: 'string', value: 'first' },
          right: { kind: 'string', value: 'second' },
        },
        {
          type: 'UNEQUAL',
          path: ['field0', 'values'],
          left: {
            kind: 'array',
            items: [
              { kind: 'float', value: 0.12 },
              { kind: 'float', value: 3.45 },
              { kind: 'float', value: 6.78 },
            ],
          },
          right: {
            kind: 'array',
            items: [
              { kind: 'float', value: 0.123 },
              { kind: 'float', value: 3.456 },
              { kind: 'float', value: 6.789 },
            ],
          },
        },
      ]);
      expect(diff.identical).toBe(false);
    });

    it('should report side-only keys of the renamed keys scenario', () => {
      const left = toml(`
        int_value = 123
        float_value = 1.5
        [field1]
        name = "b"
      `);
      const right = toml(`
        integer_value = 123
        real_value = 1.5
        [field3]
        name = "b"
      `);

      const diff = ConfigDiffer.compare(left, right);

      expect(pathsOf(diff.records, 'ONLY_IN_LEFT')).toEqual([['int_value'], ['float_value'], ['field1']]);
      expect(pathsOf(diff.records, 'ONLY_IN_RIGHT')).toEqual([['integer_value'], ['real_value'], ['field3']]);
      expect(diff.summary).toEqual({ onlyInLeft: 3, onlyInRight: 3, unequal: 0, equal: 0 });
    });

    it('should visit left keys first, then right-only keys, depth first', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT);

      expect(diff.records.map((r) => `${r.type} ${r.path.join('.')}`)).toEqual([
        'UNEQUAL id',
        'UNEQUAL retries',
        'UNEQUAL database.id',
        'UNEQUAL database.host',
        'ONLY_IN_RIGHT database.replica.lag',
        'ONLY_IN_LEFT logging',
        'ONLY_IN_RIGHT timeout',
        'ONLY_IN_RIGHT metrics',
      ]);
    });

    it('should report a side-only table as one record holding the whole subtree', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT);
      const logging = diff.records.find((r) => r.path.join('.') === 'logging');

      expect(logging).toEqual({
        type: 'ONLY_IN_LEFT',
        path: ['logging'],
        value: { kind: 'table', entries: { level: { kind: 'string', value: 'info' } } },
      });
    });

    it('should report a table/scalar mismatch as a single unequal record', () => {
      const left = toml(`
        [server]
        host = "a"
        port = 1
      `);
      const right = toml(`server = "a:1"`);

      const diff = ConfigDiffer.compare(left, right);

      expect(diff.records).toHaveLength(1);
      expect(diff.records[0]).toMatchObject({ type: 'UNEQUAL', path: ['server'] });
    });

    it('should compare arrays of tables as whole values', () => {
      const left = toml(`
        [[rule]]
        name = "a"
        [[rule]]
        name = "b"
      `);
      const right = toml(`
        [[rule]]
        name = "a"
        [[rule]]
        name = "c"
      `);

      expect(pathsOf(ConfigDiffer.compare(left, right).records, 'UNEQUAL')).toEqual([['rule']]);
    });

    it('should treat integer and float values as unequal', () => {
      const diff = ConfigDiffer.compare(toml('ratio = 1'), toml('ratio = 1.5'));
      expect(pathsOf(diff.records, 'UNEQUAL')).toEqual([['ratio']]);
    });

    it('should treat an integer and an integral float as unequal', () => {
      const diff = ConfigDiffer.compare(toml('ratio = 1'), toml('ratio = 1.0'));
      expect(diff.records).toEqual([
        {
          type: 'UNEQUAL',
          path: ['ratio'],
          left: { kind: 'integer', value: 1n },
          right: { kind: 'float', value: 1 },
        },
      ]);
    });

    it('should treat one instant written with different offsets as unequal', () => {
      const diff = ConfigDiffer.compare(
        toml('at = 1979-05-27T00:32:00-07:00'),
        toml('at = 1979-05-27T07:32:00Z')
      );
      expect(pathsOf(diff.records, 'UNEQUAL')).toEqual([['at']]);
    });

    it('should compare a quoted __proto__ key like any other key', () => {
      const diff = ConfigDiffer.compare(toml('"__proto__" = 1'), toml('"__proto__" = 2'));
      expect(diff.records).toEqual([
        {
          type: 'UNEQUAL',
          path: ['__proto__'],
          left: { kind: 'integer', value: 1n },
          right: { kind: 'integer', value: 2n },
        },
      ]);
    });

    it('should yield nothing for two empty tables', () => {
      const diff = ConfigDiffer.compare({}, {}, { includeEqual: true });
      expect(diff.records).toEqual([]);
      expect(diff.identical).toBe(true);
    });
  });

  describe('exclusions', () => {
    it('should skip an excluded key name at every depth', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT, { exclude: ['id'], includeEqual: true });

      expect(diff.records.some((r) => r.path[r.path.length - 1] === 'id')).toBe(false);
      expect(pathsOf(diff.records, 'UNEQUAL')).toEqual([['retries'], ['database', 'host']]);
    });

    it('should skip excluded side-only keys', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT, { exclude: new Set(['logging', 'lag']) });

      expect(pathsOf(diff.records, 'ONLY_IN_LEFT')).toEqual([]);
      expect(pathsOf(diff.records, 'ONLY_IN_RIGHT')).toEqual([['timeout'], ['metrics']]);
    });

    it('should drop excluded names from side-only subtrees', () => {
      const left = toml(`
        [db]
        host = "h"
        secret = "pw"

        [[db.replicas]]
        host = "r"
        secret = "pw"
      `);
      const diff = ConfigDiffer.compare(left, {}, { exclude: ['secret'] });

      expect(diff.records).toEqual([
        {
          type: 'ONLY_IN_LEFT',
          path: ['db'],
          value: {
            kind: 'table',
            entries: {
              host: { kind: 'string', value: 'h' },
              replicas: {
                kind: 'array',
                items: [{ kind: 'table', entries: { host: { kind: 'string', value: 'r' } } }],
              },
            },
          },
        },
      ]);
    });

    it('should skip an excluded table without recursing into it', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT, { exclude: ['database'] });
      expect(diff.records.some((r) => r.path[0] === 'database')).toBe(false);
    });
  });

  describe('equal records', () => {
    it('should not emit EQUAL records by default', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT);
      expect(diff.summary.equal).toBe(0);
    });

    it('should emit exactly the keys equal on both sides when requested', () => {
      const diff = ConfigDiffer.compare(LEFT, RIGHT, { includeEqual: true });

      expect(pathsOf(diff.records, 'EQUAL')).toEqual([
        ['name'],
        ['tags'],
        ['database', 'pool'],
        ['database', 'replica', 'host'],
      ]);
      expect(diff.identical).toBe(false);
    });
  });

  describe('properties', () => {
    it('should mirror side-only records when the sides are swapped', () => {
      const forward = ConfigDiffer.compare(LEFT, RIGHT);
      const backward = ConfigDiffer.compare(RIGHT, LEFT);

      const strip = (records: TDiffRecord[], type: TDiffRecord['type']) =>
        records
          .filter((r) => r.type === type)
          .map((r) => ({ path: r.path, value: 'value' in r ? r.value : undefined }))
          .sort((a, b) => a.path.join('.').localeCompare(b.path.join('.')));

      expect(strip(forward.records, 'ONLY_IN_LEFT')).toEqual(strip(backward.records, 'ONLY_IN_RIGHT'));
      expect(strip(forward.records, 'ONLY_IN_RIGHT')).toEqual(strip(backward.records, 'ONLY_IN_LEFT'));
    });

    it('should report every leaf of a document as equal to itself', () => {
      const diff = ConfigDiffer.compare(LEFT, LEFT, { includeEqual: true });

      expect(diff.records.every((r) => r.type === 'EQUAL')).toBe(true);
      expect(diff.records.map((r) => r.path.join('.'))).toEqual([
        'id',
        'name',
        'retries',
        'tags',
        'database.id',
        'database.host',
        'database.pool',
        'database.replica.host',
        'logging.level',
      ]);
      expect(diff.identical).toBe(true);
    });

    it('should report nothing for a document against itself without equal records', () => {
      expect(ConfigDiffer.compare(RIGHT, RIGHT).records).toEqual([]);
    });
  });

  describe('depth guard', () => {
    function nested(levels: number): TConfigTable {
      let table: TConfigTable = { leaf: { kind: 'integer', value: 1 } };
      for (let i = 0; i < levels; i++) {
        table = { n: { kind: 'table', entries: table } };
      }
      return table;
    }

    it('should fail with TooDeep past the configured depth', () => {
      const doc = nested(5);
      let caught: unknown;
      try {
        ConfigDiffer.compare(doc, doc, { maxDepth: 3 });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(DiffTomlError);
      expect(caught).toMatchObject({ kind: 'TooDeep', message: 'Tables are nested deeper than 3 levels' });
    });

    it('should accept documents at the configured depth', () => {
      const doc = nested(5);
      expect(ConfigDiffer.compare(doc, doc, { maxDepth: 5 }).records).toEqual([]);
    });
  });
});
