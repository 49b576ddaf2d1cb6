/* eslint-disable no-console */
/**
 * CLI logging utility with colors and formatting
 */

import { isColorDisabled } from '../../defaults.js';

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !isColorDisabled() && process.stdout.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export const logger = {
  success(message: string): void {
    console.log(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.warn(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(`${DIM}🔍 ${message}${RESET}`);
    }
  },

  log(message: string): void {
    console.log(message);
  },
};
