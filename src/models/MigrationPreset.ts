/**
 * Migration Preset Model
 *
 * Named pairing of an embedding model with a generation model, offered as a
 * starting point when moving between providers.
 */

import type { CostTier } from './EmbeddingModelDescriptor.js';

export interface MigrationPreset {
  id: string;
  name: string;
  description: string;
  /** Catalog id of the embedding model */
  embeddingModelId: string;
  generation: {
    provider: string;
    model: string;
    costTier: CostTier;
  };
  benefits: string[];
  recommended: boolean;
}

export const MIGRATION_PRESETS: readonly MigrationPreset[] = [
  {
    id: 'hybrid_optimal',
    name: 'Hybrid Optimal (Recommended)',
    description: 'Local embeddings with hosted generation: private documents, no embedding cost',
    embeddingModelId: 'ollama_nomic-embed-text',
    generation: { provider: 'openai', model: 'gpt-4o-mini', costTier: 'low' },
    benefits: ['Documents never leave the machine for embedding', 'Zero embedding cost', 'High-quality answers'],
    recommended: true
  },
  {
    id: 'openai_compatible',
    name: 'OpenAI Compatible',
    description: 'OpenAI for both embeddings and generation, embeddings reduced to 768 dimensions',
    embeddingModelId: 'openai_text-embedding-3-small',
    generation: { provider: 'openai', model: 'gpt-4o-mini', costTier: 'low' },
    benefits: ['Single provider', 'No local runtime required', 'Baseline dimension compatible'],
    recommended: false
  },
  {
    id: 'google_hybrid',
    name: 'Google Gemini Hybrid',
    description: 'Local embeddings with Gemini for generation',
    embeddingModelId: 'ollama_nomic-embed-text',
    generation: { provider: 'google', model: 'gemini-2.5-flash', costTier: 'low' },
    benefits: ['Free embeddings', 'Fast generation', 'Documents stay local for embedding'],
    recommended: false
  },
  {
    id: 'fully_local',
    name: 'Fully Local (Privacy First)',
    description: 'Embeddings and generation both served by a local Ollama runtime',
    embeddingModelId: 'ollama_nomic-embed-text',
    generation: { provider: 'ollama', model: 'llama3.1', costTier: 'free' },
    benefits: ['No network access required', 'No API cost'],
    recommended: false
  }
];
