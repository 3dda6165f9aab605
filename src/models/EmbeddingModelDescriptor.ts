/**
 * Embedding Model Descriptor
 *
 * Catalog entry for one embedding model. Each provider carries its own
 * binding: what to probe for availability and how to install it.
 */

import { BASELINE_DIMENSIONS } from '../constants/embedding-constants.js';

/** ollama = local runtime, huggingface = in-process library, openai/google = hosted */
export type EmbeddingProvider = 'ollama' | 'huggingface' | 'openai' | 'google';
export type CostTier = 'free' | 'low' | 'medium' | 'high';
export type PrivacyTier = 'local' | 'external';

interface DescriptorBase {
  /** "<provider>_<modelName>" */
  id: string;

  displayName: string;

  /** Name the provider knows the model by; goes into model_kwargs.model */
  modelName: string;

  /** Width of the vectors the model produces */
  dimensionality: number;

  costTier: CostTier;
  privacyTier: PrivacyTier;

  /** dimensionality === BASELINE_DIMENSIONS, fixed when the catalog is compiled */
  compatible: boolean;

  description: string;
}

export interface OllamaModelDescriptor extends DescriptorBase {
  provider: 'ollama';
  /** e.g. "ollama pull nomic-embed-text" */
  installDirective: string;
}

export interface HuggingFaceModelDescriptor extends DescriptorBase {
  provider: 'huggingface';
  /** npm package that must resolve in-process */
  libraryModule: string;
  installDirective: string;
}

export interface CloudModelDescriptor extends DescriptorBase {
  provider: 'openai' | 'google';
  /** Environment variable holding the provider credential */
  credentialEnvVar: string;
}

export type EmbeddingModelDescriptor =
  | OllamaModelDescriptor
  | HuggingFaceModelDescriptor
  | CloudModelDescriptor;

/**
 * Client class the generation pipeline instantiates for each provider
 */
export const CLIENT_KINDS: Record<EmbeddingProvider, string> = {
  ollama: 'OllamaClient',
  huggingface: 'HuggingFaceClient',
  openai: 'OpenAIClient',
  google: 'GoogleEmbedderClient'
};

/**
 * Fields every catalog definition supplies; id and compatibility are derived
 */
export interface ModelFields {
  modelName: string;
  displayName: string;
  dimensionality: number;
  costTier: CostTier;
  privacyTier: PrivacyTier;
  description: string;
}

function deriveBase(provider: EmbeddingProvider, fields: ModelFields): DescriptorBase {
  if (!Number.isInteger(fields.dimensionality) || fields.dimensionality <= 0) {
    throw new Error(`Invalid dimensionality for ${fields.modelName}: ${fields.dimensionality}`);
  }

  return {
    ...fields,
    id: `${provider}_${fields.modelName}`,
    compatible: fields.dimensionality === BASELINE_DIMENSIONS
  };
}

export function defineOllamaModel(fields: ModelFields): OllamaModelDescriptor {
  const descriptor: OllamaModelDescriptor = {
    ...deriveBase('ollama', fields),
    provider: 'ollama',
    installDirective: `ollama pull ${fields.modelName}`
  };
  return Object.freeze(descriptor);
}

export function defineHuggingFaceModel(
  fields: ModelFields & { libraryModule: string }
): HuggingFaceModelDescriptor {
  const { libraryModule, ...rest } = fields;
  const descriptor: HuggingFaceModelDescriptor = {
    ...deriveBase('huggingface', rest),
    provider: 'huggingface',
    libraryModule,
    installDirective: `npm install ${libraryModule}`
  };
  return Object.freeze(descriptor);
}

export function defineCloudModel(
  provider: 'openai' | 'google',
  fields: ModelFields & { credentialEnvVar: string }
): CloudModelDescriptor {
  const { credentialEnvVar, ...rest } = fields;
  const descriptor: CloudModelDescriptor = {
    ...deriveBase(provider, rest),
    provider,
    credentialEnvVar
  };
  return Object.freeze(descriptor);
}

/**
 * Install directive of a descriptor, or null for hosted models
 */
export function installDirectiveOf(descriptor: EmbeddingModelDescriptor): string | null {
  switch (descriptor.provider) {
    case 'ollama':
    case 'huggingface':
      return descriptor.installDirective;
    case 'openai':
    case 'google':
      return null;
    default:
      return assertNever(descriptor);
  }
}

/**
 * Compile-time exhaustiveness check for provider switches
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled embedding provider: ${JSON.stringify(value)}`);
}
