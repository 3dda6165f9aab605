/**
 * Model Switcher
 *
 * Moves the active embedding configuration to another catalog model:
 *
 *   idle → validating → rejected
 *                     → installing → install-failed
 *                     → configuring → configured | write-failed
 *
 * Nothing is written until every gate has passed, so a rejected or failed
 * switch leaves the previous configuration active.
 */

import { isDeepStrictEqual } from 'util';
import { Result, ok, err } from '../../lib/result-types.js';
import {
  IncompatibleDimensionError,
  NotAvailableError
} from '../../lib/errors/DocWikiErrors.js';
import type { SwitchError } from '../../lib/errors/DocWikiErrors.js';
import { createSilentLogger } from '../../lib/logger.js';
import type { Logger } from '../../lib/logger.js';
import { BASELINE_DIMENSIONS } from '../../constants/embedding-constants.js';
import { CLIENT_KINDS, assertNever } from '../../models/EmbeddingModelDescriptor.js';
import type { EmbeddingModelDescriptor } from '../../models/EmbeddingModelDescriptor.js';
import { createDefaultEmbedderConfig } from '../../models/EmbedderConfig.js';
import type { EmbedderConfigFile, EmbedderConfiguration } from '../../models/EmbedderConfig.js';
import type { EmbedderConfigStore } from '../config/EmbedderConfigStore.js';
import type { AvailabilityChecker } from './AvailabilityChecker.js';
import type { ModelInstaller } from './ModelInstaller.js';
import type { ModelCatalog } from './model-catalog.js';
import { adviseInvalidation } from './invalidation-advisor.js';

export type SwitchState =
  | 'idle'
  | 'validating'
  | 'rejected'
  | 'installing'
  | 'install-failed'
  | 'configuring'
  | 'configured'
  | 'write-failed';

export interface PreviousModel {
  model: string;
  clientKind: string;
  /** Known vector width of the previous model, null when it cannot be told */
  dimensions: number | null;
}

export interface SwitchOutcome {
  descriptor: EmbeddingModelDescriptor;
  /** Configuration active before the switch; null when none was persisted */
  previousModel: PreviousModel | null;
  /** False when the requested model was already active and nothing was written */
  changed: boolean;
  /** True when the model was installed as part of this switch */
  installed: boolean;
  /** True when an incompatible model was accepted because of --force */
  forced: boolean;
  /** Cache invalidation guidance, null when cached wikis stay valid */
  advisory: string | null;
}

export interface SwitchOptions {
  force?: boolean;
}

export interface ModelSwitcherOptions {
  catalog: ModelCatalog;
  store: EmbedderConfigStore;
  checker: AvailabilityChecker;
  installer: ModelInstaller;
  logger?: Logger;
  onTransition?: (from: SwitchState, to: SwitchState) => void;
}

/**
 * Embedder block the generation pipeline needs for a catalog model
 */
export function buildEmbedderConfiguration(descriptor: EmbeddingModelDescriptor): EmbedderConfiguration {
  const clientKind = CLIENT_KINDS[descriptor.provider];
  switch (descriptor.provider) {
    case 'ollama':
    case 'huggingface':
      return { clientKind, modelParams: { model: descriptor.modelName } };
    case 'openai':
    case 'google':
      return {
        clientKind,
        modelParams: { model: descriptor.modelName, dimensions: descriptor.dimensionality }
      };
    default:
      return assertNever(descriptor);
  }
}

export class ModelSwitcher {
  private state: SwitchState = 'idle';
  private readonly logger: Logger;

  constructor(private readonly options: ModelSwitcherOptions) {
    this.logger = options.logger ?? createSilentLogger();
  }

  async switchTo(modelId: string, switchOptions: SwitchOptions = {}): Promise<Result<SwitchOutcome, SwitchError>> {
    const force = switchOptions.force ?? false;
    const { catalog, store, checker, installer } = this.options;

    this.state = 'idle';
    this.transition('validating');

    const found = catalog.findById(modelId);
    if (found.isErr()) {
      this.transition('rejected');
      return err(found.error);
    }
    const descriptor = found.value;

    const current = await this.readCurrent();
    const previousModel = current && this.describePrevious(current.embedder);
    this.logger.info('switch', `Switching embedding model to ${descriptor.id}`, {
      from: previousModel?.model ?? null,
      force
    });

    if (!descriptor.compatible && !force) {
      this.transition('rejected');
      const alternatives = catalog.listCompatible().map((model) => model.id);
      return err(
        new IncompatibleDimensionError(descriptor.id, descriptor.dimensionality, BASELINE_DIMENSIONS, alternatives)
      );
    }

    let installed = false;
    if (!(await checker.checkAvailable(descriptor))) {
      if (descriptor.provider === 'openai' || descriptor.provider === 'google') {
        this.transition('rejected');
        return err(new NotAvailableError(descriptor.id, `set ${descriptor.credentialEnvVar} in the environment`));
      }

      this.transition('installing');
      const install = await installer.install(descriptor);
      if (install.isErr()) {
        this.transition('install-failed');
        return err(install.error);
      }
      installed = install.value.status === 'installed';
    }

    this.transition('configuring');

    const embedder = buildEmbedderConfiguration(descriptor);
    let changed = false;

    if (current && this.sameEmbedder(current.embedder, embedder)) {
      this.logger.info('switch', `${descriptor.id} is already the active model`);
    } else {
      const base = current ?? createDefaultEmbedderConfig();
      const next: EmbedderConfigFile = { ...base, embedder: this.carryOptions(base.embedder, embedder) };

      const written = await store.updateCurrent(next);
      if (written.isErr()) {
        this.transition('write-failed');
        return err(written.error);
      }
      changed = true;
    }

    this.transition('configured');

    const outcome: SwitchOutcome = {
      descriptor,
      previousModel,
      changed,
      installed,
      forced: force && !descriptor.compatible,
      advisory: null
    };
    outcome.advisory = adviseInvalidation(outcome);

    if (outcome.advisory) {
      this.logger.warn('switch', outcome.advisory, { model: descriptor.id });
    }
    this.logger.info('switch', `Active embedding model: ${descriptor.id}`, { changed, installed });

    return ok(outcome);
  }

  /**
   * Last state reached by the most recent switch
   */
  getState(): SwitchState {
    return this.state;
  }

  private transition(to: SwitchState): void {
    const from = this.state;
    this.state = to;
    this.logger.debug('switch', `${from} -> ${to}`);
    this.options.onTransition?.(from, to);
  }

  private async readCurrent(): Promise<EmbedderConfigFile | null> {
    const current = await this.options.store.getCurrent();
    if (current.isErr()) {
      this.logger.warn('switch', 'Could not read the current configuration; treating it as absent', {
        reason: current.error.message
      });
      return null;
    }
    return current.value;
  }

  private describePrevious(embedder: EmbedderConfiguration): PreviousModel {
    const known = this.options.catalog.findByConfiguration(embedder);
    return {
      model: embedder.modelParams.model,
      clientKind: embedder.clientKind,
      dimensions: known?.dimensionality ?? embedder.modelParams.dimensions ?? null
    };
  }

  private sameEmbedder(current: EmbedderConfiguration, next: EmbedderConfiguration): boolean {
    return current.clientKind === next.clientKind && isDeepStrictEqual(current.modelParams, next.modelParams);
  }

  /** Extra embedder keys (batch_size, ...) survive only when the client class stays the same */
  private carryOptions(current: EmbedderConfiguration, next: EmbedderConfiguration): EmbedderConfiguration {
    if (current.clientKind !== next.clientKind || !current.options) {
      return next;
    }
    return { ...next, options: current.options };
  }
}
