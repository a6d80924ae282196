/**
 * Provider Types
 */

/**
 * Embedding Provider Type
 */
export type EmbeddingProvider = 'ollama' | 'openai';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProvider[] = [
  'ollama',
  'openai',
];
