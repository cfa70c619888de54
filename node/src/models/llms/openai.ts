/**
 * OpenAI chat-completions implementation of CompletionService.
 */

import OpenAI from 'openai';
import type { CallOptions, CompletionService } from '../types';
import { toProviderError } from '../providerErrors';

export interface OpenAICompletionConfig {
  model?: string; // e.g., 'gpt-4o-mini'
  apiKey?: string; // Optional, falls back to OPENAI_API_KEY env var
  temperature?: number;
  maxTokens?: number;
}

const SYSTEM_PROMPT =
  'You are a JSON-only extractor for a travel search engine. Always return valid JSON.';

class OpenAICompletionService implements CompletionService {
  private readonly client: OpenAI;
  private readonly config: Required<Omit<OpenAICompletionConfig, 'apiKey'>>;

  constructor(config: OpenAICompletionConfig = {}) {
    const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('Missing OpenAI API key. Provide apiKey in config or set OPENAI_API_KEY env var');
    }
    // Retries and deadlines are owned by the rewriter/extractor, not the SDK.
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.config = {
      model: config.model || 'gpt-4o-mini',
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 300,
    };
  }

  async complete(prompt: string, options: CallOptions = {}): Promise<string> {
    try {
      const res = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: options.signal },
      );
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      throw toProviderError('completion', err);
    }
  }
}

export default OpenAICompletionService;
