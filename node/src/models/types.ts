/**
 * Provider seams for the retrieval core. Both are injected so tests can
 * substitute in-process stubs; timeouts and retries belong to the callers.
 */

export type CallOptions = {
  /** Aborting cancels the underlying request, not just its result. */
  signal?: AbortSignal;
};

/**
 * Text completion: one prompt in, raw model text out.
 */
export interface CompletionService {
  complete(prompt: string, options?: CallOptions): Promise<string>;
}

/**
 * Text embedding with a fixed output dimension.
 */
export interface EmbeddingService {
  readonly dimension: number;
  embed(text: string, options?: CallOptions): Promise<number[]>;
}
