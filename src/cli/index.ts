#!/usr/bin/env node

import { CommanderError } from 'commander';
import { createConfigManager } from '../lib/env-config.js';
import { DefaultCliContext } from './context.js';
import { createProgram } from './program.js';
import { OutputFormatter } from './utils/output.js';

const output = new OutputFormatter();
const configManager = createConfigManager();

const loaded = configManager.loadEnv();
if (loaded.isErr()) {
  output.warning(loaded.error.message);
}

const ctx = new DefaultCliContext(output, configManager);
const program = createProgram(ctx);

// Error handling
program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

try {
  await program.parseAsync(process.argv);
  process.exitCode = ctx.exitCode;
} catch (error) {
  if (error instanceof CommanderError) {
    // --help and --version also arrive here, with exit code 0
    process.exitCode = error.exitCode;
  } else {
    output.error(error instanceof Error ? error.message : String(error), error);
    process.exitCode = 1;
  }
}
