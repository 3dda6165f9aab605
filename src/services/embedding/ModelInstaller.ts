import type { ProcessRunner } from '../../lib/process-runner.js';
import { createSilentLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { InstallationFailedError } from '../../lib/errors/DocWikiErrors.js';
import { DEFAULT_INSTALL_TIMEOUT_MS } from '../../lib/env-config.js';
import { installDirectiveOf } from '../../models/EmbeddingModelDescriptor.js';
import type { EmbeddingModelDescriptor } from '../../models/EmbeddingModelDescriptor.js';

export type InstallOutcome =
  | { status: 'installed'; directive: string; stdout: string }
  | { status: 'not-required' };

export interface ModelInstallerOptions {
  runner: ProcessRunner;
  installTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs a model's install directive once, synchronously from the caller's point of view
 */
export class ModelInstaller {
  private readonly runner: ProcessRunner;
  private readonly installTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ModelInstallerOptions) {
    this.runner = options.runner;
    this.installTimeoutMs = options.installTimeoutMs ?? DEFAULT_INSTALL_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Install a model
   *
   * Hosted models have no directive and report `not-required`.
   */
  async install(descriptor: EmbeddingModelDescriptor): Promise<Result<InstallOutcome, InstallationFailedError>> {
    const directive = installDirectiveOf(descriptor);
    if (directive === null) {
      this.logger.info('install', 'Model is API-based and needs no installation', { model: descriptor.id });
      return ok({ status: 'not-required' });
    }

    const [command, ...args] = directive.split(/\s+/).filter((part) => part.length > 0);
    if (!command) {
      return err(new InstallationFailedError(descriptor.id, directive, 'empty install directive'));
    }

    this.logger.info('install', `Installing ${descriptor.displayName}`, { model: descriptor.id, directive });

    const result = await this.runner.run(command, args, { timeoutMs: this.installTimeoutMs });
    if (result.isErr()) {
      this.logger.error('install', `Failed to install ${descriptor.displayName}`, result.error, {
        model: descriptor.id,
        stderr: result.error.stderr
      });
      return err(new InstallationFailedError(descriptor.id, directive, result.error.message, result.error.stderr));
    }

    this.logger.info('install', `Installed ${descriptor.displayName}`, { model: descriptor.id });
    this.logger.debug('install', 'Installation output', { stdout: result.value.stdout });
    return ok({ status: 'installed', directive, stdout: result.value.stdout });
  }
}
