import { z } from 'zod';

import { llmProviderSchema } from '../schema/config.js';
import type { LLMProvider } from '../schema/config.js';

// ── LLMClient interface ──────────────────────────────────────

export interface GenerateOptions {
  signal?: AbortSignal | undefined;
}

export interface LLMClient {
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
  generateWithImage?(
    systemPrompt: string,
    userPrompt: string,
    imageBase64: string,
    mimeType: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

const API_KEY_ENV: Record<LLMProvider, string | undefined> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  mistral: 'MISTRAL_API_KEY',
  ollama: undefined,
  mock: undefined,
};

const BASE_URL_ENV: Record<LLMProvider, string | undefined> = {
  anthropic: 'ANTHROPIC_BASE_URL',
  openai: 'OPENAI_BASE_URL',
  google: 'GOOGLE_BASE_URL',
  mistral: 'MISTRAL_BASE_URL',
  ollama: 'OLLAMA_BASE_URL',
  mock: undefined,
};

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = llmProviderSchema.parse(env['LLM_PROVIDER'] ?? 'anthropic');
  const keyVar = API_KEY_ENV[provider];
  const baseUrlVar = BASE_URL_ENV[provider];

  return llmConfigSchema.parse({
    provider,
    apiKey: keyVar !== undefined ? emptyToUndefined(env[keyVar]) : undefined,
    model: emptyToUndefined(env['LLM_MODEL']),
    baseUrl: baseUrlVar !== undefined ? emptyToUndefined(env[baseUrlVar]) : undefined,
  });
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
