/**
 * Cache Command
 *
 * `docwiki cache list | delete | clear`: inspect and remove cached wikis,
 * typically after a switch that changed the vector width.
 */

import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { fail, requireServices } from '../context.js';

interface DeleteOptions {
  code?: string;
}

export function createCacheCommand(ctx: CliContext): Command {
  const cmd = new Command('cache').description('Manage cached wikis');

  cmd
    .command('list')
    .description('List cached wikis, most recent first')
    .action(async () => {
      const services = requireServices(ctx);
      if (!services) return;

      const entries = await services.wikiCache.listProjects();
      ctx.output.table(
        ['NAME', 'TYPE', 'LANGUAGE', 'UPDATED'],
        entries.map((entry) => [
          entry.name,
          entry.key.repoType,
          entry.key.language,
          new Date(entry.submittedAt).toISOString()
        ])
      );
    });

  cmd
    .command('delete')
    .description('Delete one cached wiki')
    .argument('<repoType>', 'Repository host type, e.g. github')
    .argument('<owner>')
    .argument('<repo>')
    .argument('<language>')
    .option('--code <code>', 'Authorization code, when auth mode is on')
    .action(async (repoType: string, owner: string, repo: string, language: string, options: DeleteOptions) => {
      const services = requireServices(ctx);
      if (!services) return;

      const result = await services.wikiCache.remove({ repoType, owner, repo, language }, options.code);
      if (result.isErr()) {
        fail(ctx, result.error.message, result.error);
        return;
      }
      ctx.output.success(`Deleted cached wiki ${owner}/${repo} (${language})`);
    });

  cmd
    .command('clear')
    .description('Delete every cached wiki')
    .action(async () => {
      const services = requireServices(ctx);
      if (!services) return;

      const result = await services.cacheStore.clear();
      if (result.isErr()) {
        fail(ctx, result.error.message, result.error);
        return;
      }
      ctx.output.success(`Removed ${result.value} cached wiki(s)`, { removed: result.value });
    });

  return cmd;
}
