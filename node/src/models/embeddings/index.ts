/**
 * Embedding implementations
 */

export { default as OpenAIEmbedding } from './openai';
export type { OpenAIEmbeddingConfig } from './openai';
export { SimpleEmbedder } from './simple';
