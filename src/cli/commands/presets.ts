import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { requireServices } from '../context.js';

/**
 * `docwiki presets`: embedding/generation pairings
 */
export function createPresetsCommand(ctx: CliContext): Command {
  return new Command('presets')
    .description('List migration presets')
    .action(() => {
      const services = requireServices(ctx);
      if (!services) return;

      ctx.output.table(
        ['ID', 'NAME', 'EMBEDDING', 'GENERATION', 'RECOMMENDED'],
        services.catalog
          .listPresets()
          .map((preset) => [
            preset.id,
            preset.name,
            preset.embeddingModelId,
            `${preset.generation.provider}/${preset.generation.model}`,
            preset.recommended ? 'yes' : ''
          ])
      );
    });
}
