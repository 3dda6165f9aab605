import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';

/**
 * `docwiki check <id>`: exit status 1 when the model is not available
 */
export function createCheckCommand(ctx: CliContext): Command {
  return new Command('check')
    .description('Check whether an embedding model is available')
    .argument('<id>', 'Catalog model id')
    .action(async (id: string) => {
      const services = requireServices(ctx);
      if (!services) return;

      const found = services.catalog.findById(id);
      if (found.isErr()) {
        fail(ctx, found.error.message, found.error);
        return;
      }

      if (await services.checker.checkAvailable(found.value)) {
        ctx.output.success(`${found.value.displayName} is available`, { id });
      } else {
        fail(ctx, `${found.value.displayName} is not available`);
      }
    });
}
