#!/usr/bin/env node
/**
 * voter-ingest: onboard state voter exports and import them into per-state tables
 */

import 'dotenv/config';
import { registerCommands } from './commands';
import { createProgram } from './program';

export { createProgram, registerCommands };

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
