#!/usr/bin/env node
/**
 * sync-launcher CLI - Prepare and run the Jira to Todoist sync
 */

import { createProgram } from './program.js';
import { error } from './utils/output.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
