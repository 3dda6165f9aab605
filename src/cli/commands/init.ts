import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';

/**
 * `docwiki init`: write the default embedding configuration on first run
 */
export function createInitCommand(ctx: CliContext): Command {
  return new Command('init')
    .description('Write the default embedding configuration if none exists')
    .action(async () => {
      const services = requireServices(ctx);
      if (!services) return;

      const created = await services.configStore.initialize();
      if (created.isErr()) {
        fail(ctx, 'Could not write the default embedding configuration', created.error);
        return;
      }

      const configPath = services.configStore.configPath;
      if (created.value) {
        ctx.output.success('Wrote default embedding configuration', { configPath });
      } else {
        ctx.output.info('Embedding configuration already exists', { configPath });
      }
    });
}
