/**
 * Diff record types for config comparison.
 */

import type { TConfigValue, TKeyPath } from '../config/types.js';

/** Record kind */
export type TDiffRecordType = 'ONLY_IN_LEFT' | 'ONLY_IN_RIGHT' | 'UNEQUAL' | 'EQUAL';

/** Key present under `path` in the left document only */
export interface TOnlyInLeftRecord {
  type: 'ONLY_IN_LEFT';
  path: TKeyPath;
  value: TConfigValue;
}

/** Key present under `path` in the right document only */
export interface TOnlyInRightRecord {
  type: 'ONLY_IN_RIGHT';
  path: TKeyPath;
  value: TConfigValue;
}

export interface TUnequalRecord {
  type: 'UNEQUAL';
  path: TKeyPath;
  left: TConfigValue;
  right: TConfigValue;
}

/** Only produced when `includeEqual` is set */
export interface TEqualRecord {
  type: 'EQUAL';
  path: TKeyPath;
  value: TConfigValue;
}

export type TDiffRecord = TOnlyInLeftRecord | TOnlyInRightRecord | TUnequalRecord | TEqualRecord;

export interface TDiffOptions {
  /** Key names skipped at every depth */
  exclude?: Iterable<string>;
  /** Emit EQUAL records for keys whose values match */
  includeEqual?: boolean;
  /** Table nesting depth past which comparison fails with TooDeep */
  maxDepth?: number;
}

/** Complete document diff */
export interface TConfigDiff {
  /** No side-only and no unequal keys */
  identical: boolean;
  summary: {
    onlyInLeft: number;
    onlyInRight: number;
    unequal: number;
    equal: number;
  };
  /** Records in traversal order */
  records: TDiffRecord[];
}
