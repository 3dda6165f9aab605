import { createRequire } from 'module';
import { join } from 'path';
import type { ProcessRunner } from '../../lib/process-runner.js';
import { createSilentLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import { describeError } from '../../lib/result-types.js';
import { DEFAULT_PROBE_TIMEOUT_MS } from '../../lib/env-config.js';
import { assertNever } from '../../models/EmbeddingModelDescriptor.js';
import type {
  CloudModelDescriptor,
  EmbeddingModelDescriptor,
  HuggingFaceModelDescriptor,
  OllamaModelDescriptor
} from '../../models/EmbeddingModelDescriptor.js';

/**
 * Answers whether a package can be loaded in-process
 */
export interface ModuleResolver {
  canResolve(specifier: string): boolean;
}

/**
 * Resolves packages the way `require` would from a directory (default: cwd),
 * which is where the install directive puts them
 */
export class NodeModuleResolver implements ModuleResolver {
  private readonly requireFrom: NodeJS.Require;

  constructor(baseDir: string = process.cwd()) {
    this.requireFrom = createRequire(join(baseDir, 'package.json'));
  }

  canResolve(specifier: string): boolean {
    try {
      this.requireFrom.resolve(specifier);
      return true;
    } catch {
      return false;
    }
  }
}

export interface AvailabilityCheckerOptions {
  runner: ProcessRunner;
  /** Environment searched for provider credentials */
  env?: NodeJS.ProcessEnv;
  moduleResolver?: ModuleResolver;
  probeTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Model names listed by `ollama list` (first column, header skipped)
 */
export function parseOllamaList(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim().split(/\s+/)[0] ?? '')
    .filter((name) => name.length > 0 && name !== 'NAME');
}

/**
 * ModelAvailabilityChecker - Decides whether a catalog model's runtime prerequisite is met
 *
 * - ollama: the local runtime lists the model
 * - huggingface: the supporting library resolves in-process
 * - openai / google: the provider credential is set
 *
 * Every probe failure is reported as "not available"; checkAvailable never rejects.
 */
export class AvailabilityChecker {
  private readonly runner: ProcessRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly moduleResolver: ModuleResolver;
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AvailabilityCheckerOptions) {
    this.runner = options.runner;
    this.env = options.env ?? process.env;
    this.moduleResolver = options.moduleResolver ?? new NodeModuleResolver();
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  async checkAvailable(descriptor: EmbeddingModelDescriptor): Promise<boolean> {
    try {
      switch (descriptor.provider) {
        case 'ollama':
          return await this.checkOllama(descriptor);
        case 'huggingface':
          return this.checkLibrary(descriptor);
        case 'openai':
        case 'google':
          return this.checkCredential(descriptor);
        default:
          return assertNever(descriptor);
      }
    } catch (error) {
      this.logger.debug('availability', 'Availability probe failed', {
        model: descriptor.id,
        reason: describeError(error)
      });
      return false;
    }
  }

  private async checkOllama(descriptor: OllamaModelDescriptor): Promise<boolean> {
    const result = await this.runner.run('ollama', ['list'], { timeoutMs: this.probeTimeoutMs });

    if (result.isErr()) {
      this.logger.debug('availability', 'ollama list failed; is Ollama installed?', {
        model: descriptor.id,
        kind: result.error.kind,
        reason: result.error.message
      });
      return false;
    }

    const installed = parseOllamaList(result.value.stdout);
    return installed.some(
      (name) => name === descriptor.modelName || name.startsWith(`${descriptor.modelName}:`)
    );
  }

  private checkLibrary(descriptor: HuggingFaceModelDescriptor): boolean {
    const loadable = this.moduleResolver.canResolve(descriptor.libraryModule);
    if (!loadable) {
      this.logger.debug('availability', 'Library not resolvable', {
        model: descriptor.id,
        module: descriptor.libraryModule
      });
    }
    return loadable;
  }

  private checkCredential(descriptor: CloudModelDescriptor): boolean {
    const value = this.env[descriptor.credentialEnvVar];
    return typeof value === 'string' && value.trim().length > 0;
  }
}
