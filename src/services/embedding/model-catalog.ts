/**
 * Embedding Model Catalog
 *
 * Fixed, ordered registry of the embedding models docwiki can switch between.
 * Compatibility with the baseline vector width is decided here, once, from
 * each model's declared dimensionality.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import { ModelUnknownError } from '../../lib/errors/DocWikiErrors.js';
import {
  CLIENT_KINDS,
  defineCloudModel,
  defineHuggingFaceModel,
  defineOllamaModel
} from '../../models/EmbeddingModelDescriptor.js';
import type { EmbeddingModelDescriptor, EmbeddingProvider } from '../../models/EmbeddingModelDescriptor.js';
import type { EmbedderConfiguration } from '../../models/EmbedderConfig.js';
import { MIGRATION_PRESETS } from '../../models/MigrationPreset.js';
import type { MigrationPreset } from '../../models/MigrationPreset.js';

/**
 * Models shipped with docwiki, in display order
 */
export const EMBEDDING_MODELS: readonly EmbeddingModelDescriptor[] = Object.freeze([
  defineOllamaModel({
    modelName: 'nomic-embed-text',
    displayName: 'Nomic Embed Text',
    dimensionality: 768,
    costTier: 'free',
    privacyTier: 'local',
    description: 'High-quality embeddings running locally with Ollama'
  }),
  defineOllamaModel({
    modelName: 'mxbai-embed-large',
    displayName: 'MixedBread Embed Large',
    dimensionality: 1024,
    costTier: 'free',
    privacyTier: 'local',
    description: 'Larger local model; needs the index rebuilt'
  }),
  defineCloudModel('openai', {
    modelName: 'text-embedding-3-small',
    displayName: 'Text Embedding 3 Small',
    dimensionality: 768,
    costTier: 'low',
    privacyTier: 'external',
    description: "OpenAI's efficient embedding model, requested at 768 dimensions",
    credentialEnvVar: 'OPENAI_API_KEY'
  }),
  defineCloudModel('openai', {
    modelName: 'text-embedding-3-large',
    displayName: 'Text Embedding 3 Large',
    dimensionality: 3072,
    costTier: 'medium',
    privacyTier: 'external',
    description: "OpenAI's highest quality embedding model; needs the index rebuilt",
    credentialEnvVar: 'OPENAI_API_KEY'
  }),
  defineHuggingFaceModel({
    modelName: 'all-mpnet-base-v2',
    displayName: 'All-MPNet-Base-v2',
    dimensionality: 768,
    costTier: 'free',
    privacyTier: 'local',
    description: 'Sentence transformer model run in-process',
    libraryModule: '@xenova/transformers'
  }),
  defineCloudModel('google', {
    modelName: 'text-embedding-004',
    displayName: 'Gemini Text Embedding 004',
    dimensionality: 768,
    costTier: 'low',
    privacyTier: 'external',
    description: "Google's hosted text embedding model",
    credentialEnvVar: 'GOOGLE_API_KEY'
  })
]);

/**
 * Model Catalog
 *
 * Read-only view over a descriptor list. The default instance serves
 * EMBEDDING_MODELS; tests may pass their own list.
 */
export class ModelCatalog {
  private readonly byId: Map<string, EmbeddingModelDescriptor>;

  constructor(
    private readonly models: readonly EmbeddingModelDescriptor[] = EMBEDDING_MODELS,
    private readonly presets: readonly MigrationPreset[] = MIGRATION_PRESETS
  ) {
    this.byId = new Map(models.map((model) => [model.id, model]));
  }

  /**
   * All models in catalog order
   */
  listAll(): readonly EmbeddingModelDescriptor[] {
    return this.models;
  }

  /**
   * Resolve a model id
   */
  findById(id: string): Result<EmbeddingModelDescriptor, ModelUnknownError> {
    const model = this.byId.get(id);
    if (!model) {
      return err(new ModelUnknownError(id, Array.from(this.byId.keys())));
    }
    return ok(model);
  }

  /**
   * Models whose vectors match the baseline width
   */
  listCompatible(): EmbeddingModelDescriptor[] {
    return this.models.filter((model) => model.compatible);
  }

  /**
   * Catalog model a persisted embedder configuration refers to, if any
   */
  findByConfiguration(config: EmbedderConfiguration): EmbeddingModelDescriptor | null {
    return (
      this.models.find(
        (model) =>
          CLIENT_KINDS[model.provider] === config.clientKind && model.modelName === config.modelParams.model
      ) ?? null
    );
  }

  /**
   * Provider behind a client class name
   */
  providerForClientKind(clientKind: string): EmbeddingProvider | null {
    for (const [provider, kind] of Object.entries(CLIENT_KINDS)) {
      if (kind === clientKind && isProvider(provider)) {
        return provider;
      }
    }
    return null;
  }

  listPresets(): readonly MigrationPreset[] {
    return this.presets;
  }
}

function isProvider(value: string): value is EmbeddingProvider {
  return value in CLIENT_KINDS;
}
