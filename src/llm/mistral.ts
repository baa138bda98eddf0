import { z } from 'zod';

import type { GenerateOptions, LLMClient } from './client.js';
import * as log from '../utils/logger.js';
import { delay } from '../utils/timing.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'mistral-large-latest';
const DEFAULT_BASE_URL = 'https://api.mistral.ai/v1';
const MAX_RETRIES = 3;

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

/** Text-only; the default models take no images. */
export function createMistralClient(
  apiKey: string,
  model?: string,
  baseUrl?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const completionsUrl = `${(baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;

  async function complete(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateOptions | undefined,
  ): Promise<string> {
    const signal = options?.signal;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      const response = await fetch(completionsUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: resolvedModel,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: 0,
        }),
        signal: signal ?? null,
      });

      if (response.status === 429) {
        const retryAfter = response.headers.get('retry-after');
        const waitMs = retryAfter ? parseFloat(retryAfter) * 1000 : (attempt + 1) * 5000;
        log.warn(`[llm] Mistral rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
        await delay(waitMs, signal);
        continue;
      }

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Mistral API error (${String(response.status)}): ${body}`);
      }

      const body: unknown = await response.json();
      return chatResponseSchema.parse(body).choices[0].message.content;
    }

    throw new Error('Mistral API: max retries exceeded due to rate limiting');
  }

  return {
    generate(systemPrompt, userPrompt, options) {
      return complete(systemPrompt, userPrompt, options);
    },
  };
}
