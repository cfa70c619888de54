export { default as OpenAICompletionService } from './openai';
export type { OpenAICompletionConfig } from './openai';
export { DisabledCompletionService } from './disabled';
