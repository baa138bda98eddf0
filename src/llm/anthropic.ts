import Anthropic from '@anthropic-ai/sdk';

import type { GenerateOptions, LLMClient } from './client.js';
import * as log from '../utils/logger.js';
import { delay } from '../utils/timing.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';
const MAX_TOKENS = 4096;
const MAX_RETRIES = 3;

const IMAGE_MEDIA_TYPES = ['image/png', 'image/jpeg', 'image/gif', 'image/webp'] as const;

type ImageMediaType = (typeof IMAGE_MEDIA_TYPES)[number];

function isImageMediaType(value: string): value is ImageMediaType {
  return (IMAGE_MEDIA_TYPES as readonly string[]).includes(value);
}

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(
  fn: () => Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await delay(waitMs, signal);
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

function firstText(response: Anthropic.Message): string {
  const firstBlock = response.content[0];
  if (!firstBlock || firstBlock.type !== 'text') {
    throw new Error('Anthropic API returned no text content');
  }
  return firstBlock.text;
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
  baseUrl?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({
    apiKey,
    ...(baseUrl !== undefined ? { baseURL: baseUrl } : {}),
  });

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const signal = options?.signal;
      const response = await withRetry(
        () =>
          client.messages.create(
            {
              model: resolvedModel,
              max_tokens: MAX_TOKENS,
              system: systemPrompt,
              messages: [{ role: 'user', content: userPrompt }],
              temperature: 0,
            },
            signal !== undefined ? { signal } : {},
          ),
        signal,
      );

      return firstText(response);
    },

    async generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: string,
      options?: GenerateOptions,
    ): Promise<string> {
      if (!isImageMediaType(mimeType)) {
        throw new Error(`Unsupported image type for Anthropic: ${mimeType}`);
      }

      const signal = options?.signal;
      const response = await withRetry(
        () =>
          client.messages.create(
            {
              model: resolvedModel,
              max_tokens: MAX_TOKENS,
              system: systemPrompt,
              messages: [
                {
                  role: 'user',
                  content: [
                    {
                      type: 'image',
                      source: {
                        type: 'base64',
                        media_type: mimeType,
                        data: imageBase64,
                      },
                    },
                    {
                      type: 'text',
                      text: userPrompt,
                    },
                  ],
                },
              ],
              temperature: 0,
            },
            signal !== undefined ? { signal } : {},
          ),
        signal,
      );

      return firstText(response);
    },
  };
}
