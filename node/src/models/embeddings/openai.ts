/**
 * OpenAI implementation of EmbeddingService
 */

import OpenAI from 'openai';
import type { CallOptions, EmbeddingService } from '../types';
import { toProviderError } from '../providerErrors';
import { ProviderUnavailableError } from '@/services/errors';

/**
 * Configuration for OpenAI embedding model
 */
export interface OpenAIEmbeddingConfig {
  model?: string; // e.g., 'text-embedding-3-small', 'text-embedding-3-large'
  apiKey?: string; // Optional, falls back to OPENAI_API_KEY env var
  dimension?: number;
}

class OpenAIEmbedding implements EmbeddingService {
  readonly dimension: number;
  private readonly model: string;
  private readonly client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig = {}) {
    const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('Missing OpenAI API key. Provide apiKey in config or set OPENAI_API_KEY env var');
    }
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.model = config.model || 'text-embedding-3-small';
    this.dimension = config.dimension ?? 1536;
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    let vector: number[] | undefined;
    try {
      const res = await this.client.embeddings.create(
        { model: this.model, input: text, dimensions: this.dimension },
        { signal: options.signal },
      );
      vector = res.data[0]?.embedding;
    } catch (err) {
      throw toProviderError('embedding', err);
    }
    if (!vector || vector.length !== this.dimension) {
      throw new ProviderUnavailableError(
        'embedding',
        `Embedding response had ${vector?.length ?? 0} dimensions, expected ${this.dimension}`,
        { retryable: false },
      );
    }
    return vector;
  }
}

export default OpenAIEmbedding;
