/**
 * Stand-in used when no OpenAI key is configured: every call fails as a
 * non-retryable provider error, so rewriting degrades and extraction falls
 * back to the keyword scan.
 */
import type { CompletionService } from '../types';
import { ProviderUnavailableError } from '@/services/errors';

export class DisabledCompletionService implements CompletionService {
  async complete(): Promise<string> {
    throw new ProviderUnavailableError('completion', 'No completion provider configured', {
      retryable: false,
    });
  }
}
