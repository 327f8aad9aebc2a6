#!/usr/bin/env -S node --import tsx
/**
 * berth CLI entry point
 */

import { createProgram } from './program.js';
import { reportError } from './context.js';

createProgram()
  .parseAsync(process.argv)
  .catch(async (err: unknown) => {
    await reportError(err);
    process.exitCode = 1;
  });
