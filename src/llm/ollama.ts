import { z } from 'zod';

import type { GenerateOptions, LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'llama3';
const DEFAULT_BASE_URL = 'http://localhost:11434';
const NUM_CTX = 16_000;

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

// ── Provider factory ─────────────────────────────────────────

/** Local models served by Ollama. No API key, no rate limiting. */
export function createOllamaClient(model?: string, baseUrl?: string): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const chatUrl = `${(baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/api/chat`;

  async function chat(
    messages: ReadonlyArray<{ role: string; content: string; images?: string[] }>,
    options: GenerateOptions | undefined,
  ): Promise<string> {
    const response = await fetch(chatUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: resolvedModel,
        messages,
        stream: false,
        options: { temperature: 0, num_ctx: NUM_CTX },
      }),
      signal: options?.signal ?? null,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Ollama API error (${String(response.status)}): ${body}`);
    }

    const body: unknown = await response.json();
    return chatResponseSchema.parse(body).message.content;
  }

  return {
    generate(systemPrompt, userPrompt, options) {
      return chat(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        options,
      );
    },

    generateWithImage(systemPrompt, userPrompt, imageBase64, _mimeType, options) {
      return chat(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt, images: [imageBase64] },
        ],
        options,
      );
    },
  };
}
