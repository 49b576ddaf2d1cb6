/**
 * Diff command - compares two TOML files key by key
 */

import { readConfigFile } from '../../config/parse.js';
import { ConfigDiffer, formatDiff } from '../../diff/index.js';
import { DEFAULT_MAX_DEPTH, isColorDisabled } from '../../defaults.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../../errors.js';

export interface DiffOptions {
  /** List keys whose values are equal */
  equal?: boolean;
  color?: boolean;
  /** Key names to ignore at any depth */
  exclude?: string[];
  /** Exit 1 when the files differ */
  exitCode?: boolean;
  maxDepth?: number;
}

export function diffCommand(fileA: string, fileB: string, options: DiffOptions = {}): void {
  const {
    equal = false,
    color = false,
    exclude = [],
    exitCode = false,
    maxDepth = DEFAULT_MAX_DEPTH,
  } = options;

  try {
    // Both documents must load before anything is printed
    const left = readConfigFile(fileA);
    const right = readConfigFile(fileB);
    logger.debug(`Loaded ${fileA} (${Object.keys(left).length} keys) and ${fileB} (${Object.keys(right).length} keys)`);

    const diff = ConfigDiffer.compare(left, right, { exclude, includeEqual: equal, maxDepth });
    const { summary } = diff;
    logger.debug(
      `only-left=${summary.onlyInLeft} only-right=${summary.onlyInRight} unequal=${summary.unequal} equal=${summary.equal}`
    );

    const useColor = color && !isColorDisabled();
    if (color && !useColor) {
      logger.warn('NO_COLOR is set, printing without color');
    }

    const output = formatDiff(diff, { leftLabel: fileA, rightLabel: fileB, color: useColor });
    if (output) {
      logger.log(output);
    }

    if (diff.identical) {
      logger.success(`No differences between ${fileA} and ${fileB}`);
    } else if (exitCode) {
      process.exit(1);
    }
  } catch (error) {
    logger.error(getErrorMessage(error));
    process.exit(1);
  }
}
