/**
 * Shared state handed to every CLI command
 *
 * Services are built on first use so that `--help` and argument errors never
 * touch the file system. Commands report failure through exitCode instead of
 * exiting the process.
 */

import { Result, ok, err } from '../lib/result-types.js';
import type { ConfigError } from '../lib/errors/DocWikiErrors.js';
import type { ConfigurationManager } from '../lib/env-config.js';
import { Logger } from '../lib/logger.js';
import type { LogLevel } from '../lib/logger.js';
import { createServices } from '../services/service-container.js';
import type { Services } from '../services/service-container.js';
import type { OutputFormatter } from './utils/output.js';

export interface CliContext {
  readonly output: OutputFormatter;
  services(): Result<Services, ConfigError>;
  setLogLevel(level: LogLevel): void;
  exitCode: number;
}

/**
 * Print a failure and mark the run as failed
 */
export function fail(ctx: CliContext, message: string, error?: unknown): void {
  ctx.output.error(message, error);
  ctx.exitCode = 1;
}

/**
 * Services for a command, or null after reporting the configuration error
 */
export function requireServices(ctx: CliContext): Services | null {
  const services = ctx.services();
  if (services.isErr()) {
    fail(ctx, 'Invalid configuration', services.error);
    return null;
  }
  return services.value;
}

export class DefaultCliContext implements CliContext {
  exitCode = 0;
  private built: Services | null = null;
  private logLevel: LogLevel = 'warn';

  constructor(
    readonly output: OutputFormatter,
    private readonly configManager: ConfigurationManager
  ) {}

  services(): Result<Services, ConfigError> {
    if (this.built) {
      return ok(this.built);
    }

    const config = this.configManager.getRuntimeConfig();
    if (config.isErr()) {
      return err(config.error);
    }

    const logger = new Logger({ logDir: config.value.logDir, consoleLevel: this.logLevel });
    this.built = createServices(config.value, { logger, env: this.configManager.getEnvironment() });
    return ok(this.built);
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.built?.logger.setConsoleLevel(level);
  }
}
