#!/usr/bin/env node
/**
 * mlproj-refactor CLI entry point.
 */

import { createProgram } from './program.js';
import { closeLogger } from '../core/logger.js';

const MINIMUM_NODE_MAJOR = 20;

const nodeMajor = Number(process.versions.node.split('.')[0]);
if (nodeMajor < MINIMUM_NODE_MAJOR) {
  process.stderr.write(
    `\nError: mlproj-refactor requires Node.js v${MINIMUM_NODE_MAJOR}+ but found v${process.versions.node}\n\n`,
  );
  process.exit(1);
}

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  })
  .finally(closeLogger);
