/**
 * difftoml CLI
 * Command-line interface for comparing two TOML files
 *
 * The executable entry point is bin.ts; this module only builds the program.
 */

import { Command, InvalidArgumentError } from 'commander';
import { diffCommand } from './commands/diff.js';
import { logger } from './utils/logger.js';
import { DEFAULT_MAX_DEPTH, VERSION } from '../defaults.js';

/** -x may be repeated and takes comma-separated names */
function collectKeys(value: string, previous: string[]): string[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  return [...previous, ...names];
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return depth;
}

interface TCliOptions {
  equal: boolean;
  color: boolean;
  exclude: string[];
  exitCode: boolean;
  maxDepth: number;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('difftoml')
    .description('Display the differences between two TOML files')
    .version(VERSION, '-v, --version', 'Output the current version')
    .argument('<file_a>', 'First TOML file')
    .argument('<file_b>', 'Second TOML file')
    .allowExcessArguments(false)
    .option('-e, --equal', 'Also list keys whose values are equal in both files', false)
    .option('-c, --color', 'Colorize output', false)
    .option('-x, --exclude <keyname>', 'Ignore keys with this name at any depth (repeatable)', collectKeys, [])
    .option('--exit-code', 'Exit with status 1 when the files differ', false)
    .option('--max-depth <n>', 'Maximum table nesting depth to compare', parseDepth, DEFAULT_MAX_DEPTH)
    .action((fileA: string, fileB: string, options: TCliOptions) => {
      diffCommand(fileA, fileB, options);
    });

  program.configureOutput({
    writeErr: (str) => {
      const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
      if (trimmed) {
        logger.error(trimmed);
      }
    },
    writeOut: (str) => process.stdout.write(str),
  });

  return program;
}
