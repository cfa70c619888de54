import OpenAI from 'openai';
import { ProviderUnavailableError, TimeoutError, type ProviderKind } from '@/services/errors';

/**
 * Maps OpenAI SDK failures onto ProviderUnavailableError. Caller aborts pass
 * through unchanged so cancellation is never mistaken for an outage.
 */
export function toProviderError(provider: ProviderKind, err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError) return err;
  if (err instanceof ProviderUnavailableError) return err;
  if (err instanceof TimeoutError) {
    return new ProviderUnavailableError(provider, err.message, { retryable: true, cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    // Includes APIConnectionTimeoutError.
    return new ProviderUnavailableError(provider, err.message, { retryable: true, cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const retryable = status === undefined || status === 408 || status === 429 || status >= 500;
    return new ProviderUnavailableError(provider, err.message, { status, retryable, cause: err });
  }
  return err;
}
