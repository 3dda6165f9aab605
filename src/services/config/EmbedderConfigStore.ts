/**
 * Embedding Configuration Store
 *
 * Owns <configDir>/embedder.json, the single active embedding configuration,
 * and its one-deep backup embedder.json.bak.
 *
 * Updates copy the current file to the backup, then replace the primary.
 * This is not a transaction: a crash between the two steps leaves a valid
 * backup and whatever the primary held. There is no lock; two overlapping
 * updates may interleave their backup and write steps.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { Result, ok, err, describeError, errnoCode } from '../../lib/result-types.js';
import { ConfigReadFailedError, ConfigWriteFailedError } from '../../lib/errors/DocWikiErrors.js';
import { createSilentLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import { EMBEDDER_CONFIG_FILES } from '../../constants/embedding-constants.js';
import {
  createDefaultEmbedderConfig,
  parseEmbedderConfigFile,
  serializeEmbedderConfigFile
} from '../../models/EmbedderConfig.js';
import type { EmbedderConfigFile } from '../../models/EmbedderConfig.js';
import type { EmbeddingProvider } from '../../models/EmbeddingModelDescriptor.js';
import { ModelCatalog } from '../embedding/model-catalog.js';

export interface EmbedderConfigStoreOptions {
  /** Directory holding embedder.json */
  configDir: string;
  catalog?: ModelCatalog;
  logger?: Logger;
}

/**
 * Summary of the active configuration for status displays
 */
export interface EmbedderConfigStatus {
  model: string;
  clientKind: string;
  provider: EmbeddingProvider | null;
  /** Catalog width, else model_kwargs.dimensions, else unknown */
  dimensions: number | null;
  configPath: string;
  /** True when no file exists yet and the defaults are reported */
  isDefault: boolean;
}

export class EmbedderConfigStore {
  readonly configPath: string;
  readonly backupPath: string;
  private readonly tempPath: string;
  private readonly configDir: string;
  private readonly catalog: ModelCatalog;
  private readonly logger: Logger;

  constructor(options: EmbedderConfigStoreOptions) {
    this.configDir = options.configDir;
    this.configPath = join(options.configDir, EMBEDDER_CONFIG_FILES.CONFIG_FILENAME);
    this.backupPath = join(options.configDir, EMBEDDER_CONFIG_FILES.BACKUP_FILENAME);
    this.tempPath = join(options.configDir, EMBEDDER_CONFIG_FILES.TEMP_FILENAME);
    this.catalog = options.catalog ?? new ModelCatalog();
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Read the active configuration
   *
   * @returns null when no file exists yet; the caller applies defaults
   */
  async getCurrent(): Promise<Result<EmbedderConfigFile | null, ConfigReadFailedError>> {
    return this.readConfigFile(this.configPath);
  }

  /**
   * Read the active configuration, falling back to the defaults
   */
  async getCurrentOrDefault(): Promise<Result<EmbedderConfigFile, ConfigReadFailedError>> {
    const current = await this.getCurrent();
    return current.map((file) => file ?? createDefaultEmbedderConfig());
  }

  /**
   * Read the retained backup, null when none exists
   */
  async readBackup(): Promise<Result<EmbedderConfigFile | null, ConfigReadFailedError>> {
    return this.readConfigFile(this.backupPath);
  }

  /**
   * Write the default configuration if no file exists yet
   *
   * @returns true when the file was created, false when one already existed
   */
  async initialize(): Promise<Result<boolean, ConfigWriteFailedError>> {
    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, serializeEmbedderConfigFile(createDefaultEmbedderConfig()), {
        encoding: 'utf-8',
        flag: 'wx'
      });
      this.logger.info('config', 'Wrote default embedding configuration', { path: this.configPath });
      return ok(true);
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return ok(false);
      }
      this.logger.error('config', 'Failed to write default embedding configuration', error, {
        path: this.configPath
      });
      return err(new ConfigWriteFailedError(this.configPath, describeError(error)));
    }
  }

  /**
   * Replace the active configuration
   *
   * The current file, if any, is first copied byte-for-byte over the backup.
   * The new content is written to a scratch file and renamed into place.
   * Nothing is retried.
   */
  async updateCurrent(newConfig: EmbedderConfigFile): Promise<Result<void, ConfigWriteFailedError>> {
    try {
      await fs.mkdir(this.configDir, { recursive: true });
    } catch (error) {
      return err(new ConfigWriteFailedError(this.configPath, describeError(error)));
    }

    try {
      await fs.copyFile(this.configPath, this.backupPath);
      this.logger.info('config', 'Backed up embedding configuration', { backup: this.backupPath });
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.error('config', 'Failed to back up embedding configuration', error, {
          backup: this.backupPath
        });
        return err(new ConfigWriteFailedError(this.backupPath, describeError(error)));
      }
    }

    try {
      await fs.writeFile(this.tempPath, serializeEmbedderConfigFile(newConfig), 'utf-8');
      await fs.rename(this.tempPath, this.configPath);
    } catch (error) {
      this.logger.error('config', 'Failed to update embedding configuration', error, { path: this.configPath });
      await this.removeTempFile();
      return err(new ConfigWriteFailedError(this.configPath, describeError(error)));
    }

    this.logger.info('config', 'Updated embedding configuration', {
      clientKind: newConfig.embedder.clientKind,
      model: newConfig.embedder.modelParams.model
    });
    return ok(undefined);
  }

  /**
   * Describe the active configuration, resolving provider and width through the catalog
   */
  async describe(): Promise<Result<EmbedderConfigStatus, ConfigReadFailedError>> {
    const current = await this.getCurrent();
    if (current.isErr()) {
      return err(current.error);
    }

    const file = current.value ?? createDefaultEmbedderConfig();
    const { embedder } = file;
    const descriptor = this.catalog.findByConfiguration(embedder);

    return ok({
      model: embedder.modelParams.model,
      clientKind: embedder.clientKind,
      provider: descriptor?.provider ?? this.catalog.providerForClientKind(embedder.clientKind),
      dimensions: descriptor?.dimensionality ?? embedder.modelParams.dimensions ?? null,
      configPath: this.configPath,
      isDefault: current.value === null
    });
  }

  private async readConfigFile(path: string): Promise<Result<EmbedderConfigFile | null, ConfigReadFailedError>> {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return ok(null);
      }
      return err(new ConfigReadFailedError(path, describeError(error)));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.error('config', 'Invalid JSON in embedding configuration', error, { path });
      return err(new ConfigReadFailedError(path, `invalid JSON: ${describeError(error)}`));
    }

    const parsed = parseEmbedderConfigFile(raw);
    if (parsed.isErr()) {
      this.logger.error('config', 'Embedding configuration does not match the expected schema', undefined, {
        path,
        issues: parsed.error
      });
      return err(new ConfigReadFailedError(path, parsed.error));
    }

    return ok(parsed.value);
  }

  private async removeTempFile(): Promise<void> {
    try {
      await fs.rm(this.tempPath, { force: true });
    } catch (error) {
      this.logger.warn('config', 'Could not remove scratch configuration file', {
        path: this.tempPath,
        reason: describeError(error)
      });
    }
  }
}
