/**
 * Switch Command
 *
 * `docwiki switch <id> [--force]`: makes a catalog model the active
 * embedding model, installing it first when needed.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';

interface SwitchCommandOptions {
  force?: boolean;
}

export function createSwitchCommand(ctx: CliContext): Command {
  return new Command('switch')
    .description('Switch the active embedding model')
    .argument('<id>', 'Catalog model id')
    .option('--force', 'Accept a model whose vector width differs from the baseline')
    .action(async (id: string, options: SwitchCommandOptions) => {
      const services = requireServices(ctx);
      if (!services) return;

      const spinner = ctx.output.spinner(`Switching to ${id}...`);
      const result = await services.switcher.switchTo(id, { force: options.force === true });

      if (result.isErr()) {
        spinner.fail(`Could not switch to ${id}`);
        fail(ctx, result.error.message, result.error);
        return;
      }

      const outcome = result.value;
      const message = outcome.changed
        ? `Switched to ${outcome.descriptor.displayName}`
        : `${outcome.descriptor.displayName} is already active`;
      spinner.succeed(message);

      ctx.output.success(message, {
        id: outcome.descriptor.id,
        previous: outcome.previousModel?.model ?? null,
        dimensions: outcome.descriptor.dimensionality,
        installed: outcome.installed,
        forced: outcome.forced
      });

      if (outcome.advisory) {
        ctx.output.warning(outcome.advisory);
      }
    });
}
