#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { argv } from 'process';
import { runCli } from './cli/commands.js';

export { runCli, createProgram } from './cli/commands.js';

// Only run CLI when this module is executed directly (not imported in tests)
const __filename = fileURLToPath(import.meta.url);
// argv[1] is the bin symlink when installed globally
const isMain = argv[1] !== undefined && realpathSync(argv[1]) === __filename;
if (isMain) {
  process.exitCode = await runCli(argv);
}
