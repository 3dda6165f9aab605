/**
 * Embedder Config Model
 *
 * The persisted "active embedding configuration" (embedder.json). The file
 * also carries retriever and text splitter sections owned by the generation
 * pipeline; those and any unknown keys are preserved verbatim.
 */

import { z } from 'zod';
import { Result, ok, err } from '../lib/result-types.js';

/**
 * model_kwargs: "model" is required, "dimensions" is set for hosted providers
 */
export interface ModelParams {
  model: string;
  dimensions?: number;
  [key: string]: unknown;
}

export interface EmbedderConfiguration {
  /** client_class, e.g. "OllamaClient" */
  clientKind: string;
  /** model_kwargs */
  modelParams: ModelParams;
  /** Other keys of the embedder block (batch_size, ...) */
  options?: Record<string, unknown>;
}

export interface EmbedderConfigFile {
  embedder: EmbedderConfiguration;
  retriever?: Record<string, unknown>;
  textSplitter?: Record<string, unknown>;
  /** Top-level keys this package does not interpret */
  extra?: Record<string, unknown>;
}

const ModelParamsSchema = z
  .object({
    model: z.string().min(1),
    dimensions: z.number().int().positive().optional()
  })
  .passthrough();

const EmbedderBlockSchema = z
  .object({
    client_class: z.string().min(1),
    model_kwargs: ModelParamsSchema
  })
  .passthrough();

export const EmbedderConfigFileSchema = z
  .object({
    embedder: EmbedderBlockSchema,
    retriever: z.record(z.string(), z.unknown()).optional(),
    text_splitter: z.record(z.string(), z.unknown()).optional()
  })
  .passthrough();

/**
 * Configuration written on first run; a new object on every call
 */
export function createDefaultEmbedderConfig(): EmbedderConfigFile {
  return {
    embedder: {
      clientKind: 'OllamaClient',
      modelParams: { model: 'nomic-embed-text' }
    },
    retriever: { top_k: 20 },
    textSplitter: { split_by: 'word', chunk_size: 350, chunk_overlap: 100 }
  };
}

/**
 * Validate raw JSON and map it onto EmbedderConfigFile
 *
 * @returns Parsed file, or a message describing the first schema problems
 */
export function parseEmbedderConfigFile(raw: unknown): Result<EmbedderConfigFile, string> {
  const parsed = EmbedderConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
    );
  }

  const { embedder, retriever, text_splitter, ...extra } = parsed.data;
  const { client_class, model_kwargs, ...options } = embedder;

  const file: EmbedderConfigFile = {
    embedder: {
      clientKind: client_class,
      modelParams: { ...model_kwargs }
    }
  };
  if (Object.keys(options).length > 0) file.embedder.options = options;
  if (retriever) file.retriever = retriever;
  if (text_splitter) file.textSplitter = text_splitter;
  if (Object.keys(extra).length > 0) file.extra = extra;

  return ok(file);
}

/**
 * Serialize to the on-disk JSON layout (2-space indent, trailing newline)
 */
export function serializeEmbedderConfigFile(file: EmbedderConfigFile): string {
  const wire: Record<string, unknown> = {
    embedder: {
      client_class: file.embedder.clientKind,
      model_kwargs: file.embedder.modelParams,
      ...file.embedder.options
    }
  };
  if (file.retriever) wire.retriever = file.retriever;
  if (file.textSplitter) wire.text_splitter = file.textSplitter;

  return JSON.stringify({ ...wire, ...file.extra }, null, 2) + '\n';
}
