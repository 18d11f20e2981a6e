#!/usr/bin/env node
/**
 * dbchat CLI
 * Configuration comes from DBCHAT_* environment variables
 */

import { createProgram } from './commands/program.js';

await createProgram().parseAsync(process.argv);
