import { Command } from 'commander';
import type { CliContext } from './context.js';
import { OutputFormat } from './utils/output.js';
import { createInitCommand } from './commands/init.js';
import { createListCommand } from './commands/list.js';
import { createInstallCommand } from './commands/install.js';
import { createSwitchCommand } from './commands/switch.js';
import { createStatusCommand } from './commands/status.js';
import { createCheckCommand } from './commands/check.js';
import { createPresetsCommand } from './commands/presets.js';
import { createCacheCommand } from './commands/cache.js';

interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Build the docwiki command tree around a context
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('docwiki')
    .description('Manage the embedding model and wiki cache of a documentation generator')
    .version('0.1.0')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Suppress non-error output')
    .hook('preAction', (thisCommand) => {
      const opts: GlobalOptions = thisCommand.opts();
      if (opts.json) {
        ctx.output.setFormat(OutputFormat.JSON);
      }

      if (opts.verbose && opts.quiet) {
        throw new Error('Cannot use both --verbose and --quiet flags together');
      }
      if (opts.verbose) {
        ctx.setLogLevel('debug');
      }
      if (opts.quiet) {
        ctx.setLogLevel('error');
        ctx.output.setQuiet(true);
      }
    });

  program.addCommand(createInitCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createInstallCommand(ctx));
  program.addCommand(createSwitchCommand(ctx));
  program.addCommand(createStatusCommand(ctx));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createPresetsCommand(ctx));
  program.addCommand(createCacheCommand(ctx));

  return program;
}
