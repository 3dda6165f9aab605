/**
 * Install Command
 *
 * `docwiki install <id>`: runs the model's install directive unless the
 * model is already available.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';

export function createInstallCommand(ctx: CliContext): Command {
  return new Command('install')
    .description('Install an embedding model')
    .argument('<id>', 'Catalog model id, e.g. ollama_nomic-embed-text')
    .action(async (id: string) => {
      const services = requireServices(ctx);
      if (!services) return;

      const found = services.catalog.findById(id);
      if (found.isErr()) {
        fail(ctx, found.error.message, found.error);
        return;
      }
      const model = found.value;

      if (await services.checker.checkAvailable(model)) {
        ctx.output.success(`${model.displayName} is already available`, { id: model.id });
        return;
      }

      const spinner = ctx.output.spinner(`Installing ${model.displayName}...`);
      const result = await services.installer.install(model);

      if (result.isErr()) {
        spinner.fail(`Failed to install ${model.displayName}`);
        fail(ctx, result.error.message, result.error);
        return;
      }

      if (result.value.status === 'not-required') {
        spinner.succeed(`${model.displayName} is API-based`);
        const credential = model.provider === 'openai' || model.provider === 'google' ? model.credentialEnvVar : null;
        ctx.output.warning(`${model.displayName} needs no installation but is not available`, {
          credential
        });
        return;
      }

      spinner.succeed(`Installed ${model.displayName}`);
      ctx.output.success(`Installed ${model.displayName}`, { id: model.id, directive: result.value.directive });
    });
}
