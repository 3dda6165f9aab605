/**
 * List Command
 *
 * `docwiki list`: every catalog model with its width and markers for the
 * active, installed and baseline-compatible models.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';
import type { Cell } from '../utils/output.js';

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List available embedding models')
    .action(async () => {
      const services = requireServices(ctx);
      if (!services) return;

      const current = await services.configStore.getCurrentOrDefault();
      if (current.isErr()) {
        fail(ctx, 'Could not read the embedding configuration', current.error);
        return;
      }
      const active = services.catalog.findByConfiguration(current.value.embedder);

      const rows: Cell[][] = [];
      for (const model of services.catalog.listAll()) {
        const installed = await services.checker.checkAvailable(model);
        rows.push([
          model.id,
          model.displayName,
          model.dimensionality,
          model.compatible ? 'yes' : 'no',
          installed ? 'yes' : 'no',
          model.id === active?.id ? 'CURRENT' : ''
        ]);
      }

      ctx.output.table(['ID', 'NAME', 'DIMS', 'COMPATIBLE', 'INSTALLED', 'STATUS'], rows);
    });
}
