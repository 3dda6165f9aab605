import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';

/**
 * `docwiki status`: the active embedding configuration
 */
export function createStatusCommand(ctx: CliContext): Command {
  return new Command('status')
    .description('Show the active embedding configuration')
    .action(async () => {
      const services = requireServices(ctx);
      if (!services) return;

      const status = await services.configStore.describe();
      if (status.isErr()) {
        fail(ctx, 'Could not read the embedding configuration', status.error);
        return;
      }

      const { model, clientKind, provider, dimensions, configPath, isDefault } = status.value;
      ctx.output.info(isDefault ? 'Using default embedding configuration' : 'Active embedding configuration', {
        model,
        clientKind,
        provider,
        dimensions,
        configPath
      });
    });
}
