#!/usr/bin/env node
/**
 * plinth CLI entry point
 *
 * Usage:
 *   plinth start --app ./server.ts [--port 8000] [--path-prefix /proxy/8000]
 *   plinth inspect --app ./server.ts
 */

import { toErrorMessage } from '@plinth/core';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Command execution failed: ${toErrorMessage(error)}`);
    process.exit(1);
  });
