#!/usr/bin/env node
import { createProgram } from './index.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../errors.js';

try {
  createProgram().parse(process.argv);
} catch (error) {
  logger.error(`Command failed: ${getErrorMessage(error)}`);
  process.exit(1);
}
