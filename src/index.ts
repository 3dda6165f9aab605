/**
 * docwiki-core public API
 */

export { ModelCatalog, EMBEDDING_MODELS } from './services/embedding/model-catalog.js';
export { AvailabilityChecker, NodeModuleResolver, parseOllamaList } from './services/embedding/AvailabilityChecker.js';
export type { ModuleResolver, AvailabilityCheckerOptions } from './services/embedding/AvailabilityChecker.js';
export { ModelInstaller } from './services/embedding/ModelInstaller.js';
export type { InstallOutcome, ModelInstallerOptions } from './services/embedding/ModelInstaller.js';
export { ModelSwitcher, buildEmbedderConfiguration } from './services/embedding/ModelSwitcher.js';
export type {
  SwitchState,
  SwitchOutcome,
  SwitchOptions,
  PreviousModel,
  ModelSwitcherOptions
} from './services/embedding/ModelSwitcher.js';
export { adviseInvalidation } from './services/embedding/invalidation-advisor.js';
export { EmbedderConfigStore } from './services/config/EmbedderConfigStore.js';
export type { EmbedderConfigStoreOptions, EmbedderConfigStatus } from './services/config/EmbedderConfigStore.js';
export { WikiCacheStore } from './services/cache/WikiCacheStore.js';
export type { WikiCacheStoreOptions } from './services/cache/WikiCacheStore.js';
export { WikiCacheService } from './services/cache/WikiCacheService.js';
export type { SaveWikiRequest, RemoveWikiError, WikiCacheServiceOptions } from './services/cache/WikiCacheService.js';
export {
  encodeCacheFilename,
  parseCacheFilename,
  isCacheFilename,
  validateCacheKey
} from './services/cache/wiki-cache-filename.js';
export { createServices } from './services/service-container.js';
export type { Services, ServiceDependencies } from './services/service-container.js';

export * from './models/EmbeddingModelDescriptor.js';
export * from './models/EmbedderConfig.js';
export * from './models/WikiCache.js';
export * from './models/MigrationPreset.js';
export * from './lib/errors/DocWikiErrors.js';
export { BASELINE_DIMENSIONS } from './constants/embedding-constants.js';
export { ConfigurationManager, createConfigManager } from './lib/env-config.js';
export type { RuntimeConfig, LanguageSettings, AuthSettings } from './lib/env-config.js';
export { Logger, createSilentLogger } from './lib/logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './lib/logger.js';
export { NodeProcessRunner, ProcessError } from './lib/process-runner.js';
export type { ProcessRunner, ProcessOutput, RunOptions } from './lib/process-runner.js';
