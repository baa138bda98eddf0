/**
 * LLM abstraction module.
 * Provider-agnostic text generation plus the `decide` capability the
 * engine consumes. Only module allowed to make LLM API calls.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createGoogleClient } from './google.js';
import { createMistralClient } from './mistral.js';
import { createOllamaClient } from './ollama.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export * from './model.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createGoogleClient } from './google.js';
export { createMistralClient } from './mistral.js';
export { createOllamaClient } from './ollama.js';
export { createMockClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) {
        throw new Error(
          'ANTHROPIC_API_KEY is required when using the anthropic provider',
        );
      }
      return createAnthropicClient(config.apiKey, config.model, config.baseUrl);
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new Error(
          'OPENAI_API_KEY is required when using the openai provider',
        );
      }
      return createOpenAIClient(config.apiKey, config.model, config.baseUrl);
    }
    case 'google': {
      if (!config.apiKey) {
        throw new Error(
          'GOOGLE_API_KEY is required when using the google provider',
        );
      }
      return createGoogleClient(config.apiKey, config.model, config.baseUrl);
    }
    case 'mistral': {
      if (!config.apiKey) {
        throw new Error(
          'MISTRAL_API_KEY is required when using the mistral provider',
        );
      }
      return createMistralClient(config.apiKey, config.model, config.baseUrl);
    }
    case 'ollama':
      return createOllamaClient(config.model, config.baseUrl);
    case 'mock':
      return createMockClient();
  }
}
