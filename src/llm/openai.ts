import { z } from 'zod';

import type { GenerateOptions, LLMClient } from './client.js';
import * as log from '../utils/logger.js';
import { delay } from '../utils/timing.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
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

type ChatMessage =
  | { role: 'system'; content: string }
  | {
      role: 'user';
      content:
        | string
        | Array<
            | { type: 'text'; text: string }
            | { type: 'image_url'; image_url: { url: string } }
          >;
    };

// ── Rate-limit-aware fetch ───────────────────────────────────

async function fetchWithRetry(
  url: string,
  init: RequestInit,
  signal: AbortSignal | undefined,
): Promise<Response> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    const response = await fetch(url, { ...init, signal: signal ?? null });

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * 5000;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await delay(waitMs, signal);
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `OpenAI API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('OpenAI API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
  baseUrl?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const completionsUrl = `${(baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/chat/completions`;

  async function complete(
    messages: readonly ChatMessage[],
    options: GenerateOptions | undefined,
  ): Promise<string> {
    const response = await fetchWithRetry(
      completionsUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: resolvedModel,
          messages,
          temperature: 0,
        }),
      },
      options?.signal,
    );

    const body: unknown = await response.json();
    const parsed = chatResponseSchema.parse(body);

    return parsed.choices[0].message.content;
  }

  return {
    generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      return complete(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        options,
      );
    },

    generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const dataUri = `data:${mimeType};base64,${imageBase64}`;

      return complete(
        [
          { role: 'system', content: systemPrompt },
          {
            role: 'user',
            content: [
              { type: 'image_url', image_url: { url: dataUri } },
              { type: 'text', text: userPrompt },
            ],
          },
        ],
        options,
      );
    },
  };
}
