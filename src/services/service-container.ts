/**
 * Service wiring
 *
 * Builds one instance of each service from resolved runtime settings. The
 * hosting process owns the returned handles; nothing here is a singleton.
 */

import type { RuntimeConfig } from '../lib/env-config.js';
import { Logger } from '../lib/logger.js';
import { NodeProcessRunner } from '../lib/process-runner.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import { ModelCatalog } from './embedding/model-catalog.js';
import { AvailabilityChecker } from './embedding/AvailabilityChecker.js';
import type { ModuleResolver } from './embedding/AvailabilityChecker.js';
import { ModelInstaller } from './embedding/ModelInstaller.js';
import { ModelSwitcher } from './embedding/ModelSwitcher.js';
import type { SwitchState } from './embedding/ModelSwitcher.js';
import { EmbedderConfigStore } from './config/EmbedderConfigStore.js';
import { WikiCacheStore } from './cache/WikiCacheStore.js';
import { WikiCacheService } from './cache/WikiCacheService.js';

export interface ServiceDependencies {
  logger?: Logger;
  runner?: ProcessRunner;
  moduleResolver?: ModuleResolver;
  /** Environment searched for provider credentials */
  env?: NodeJS.ProcessEnv;
  onSwitchTransition?: (from: SwitchState, to: SwitchState) => void;
}

export interface Services {
  logger: Logger;
  catalog: ModelCatalog;
  configStore: EmbedderConfigStore;
  checker: AvailabilityChecker;
  installer: ModelInstaller;
  switcher: ModelSwitcher;
  cacheStore: WikiCacheStore;
  wikiCache: WikiCacheService;
}

export function createServices(config: RuntimeConfig, deps: ServiceDependencies = {}): Services {
  const logger = deps.logger ?? new Logger({ logDir: config.logDir });
  const runner = deps.runner ?? new NodeProcessRunner(config.probeTimeoutMs);

  const catalog = new ModelCatalog();
  const configStore = new EmbedderConfigStore({ configDir: config.configDir, catalog, logger });
  const checker = new AvailabilityChecker({
    runner,
    env: deps.env,
    moduleResolver: deps.moduleResolver,
    probeTimeoutMs: config.probeTimeoutMs,
    logger
  });
  const installer = new ModelInstaller({ runner, installTimeoutMs: config.installTimeoutMs, logger });
  const switcher = new ModelSwitcher({
    catalog,
    store: configStore,
    checker,
    installer,
    logger,
    onTransition: deps.onSwitchTransition
  });

  const cacheStore = new WikiCacheStore({ cacheDir: config.cacheDir, logger });
  const wikiCache = new WikiCacheService({
    store: cacheStore,
    languages: config.languages,
    auth: config.auth,
    logger
  });

  return { logger, catalog, configStore, checker, installer, switcher, cacheStore, wikiCache };
}
