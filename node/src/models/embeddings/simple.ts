// Deterministic hashed bag-of-words embedding. Used offline (EMBEDDING_PROVIDER=hash) and in tests.

import type { CallOptions, EmbeddingService } from '../types';
import { tokenize } from '@/services/providers/retrieval-vector-utils';

export class SimpleEmbedder implements EmbeddingService {
  readonly dimension: number;

  constructor(dim = 64) {
    this.dimension = dim;
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    options.signal?.throwIfAborted();
    const vec = new Array<number>(this.dimension).fill(0);

    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dimension] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}
