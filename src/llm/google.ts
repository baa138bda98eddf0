import { z } from 'zod';

import type { GenerateOptions, LLMClient } from './client.js';
import * as log from '../utils/logger.js';
import { delay } from '../utils/timing.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gemini-1.5-flash';
const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
const MAX_RETRIES = 3;

// ── Response validation ──────────────────────────────────────

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })),
        }),
      }),
    )
    .nonempty(),
});

type Part = { text: string } | { inlineData: { mimeType: string; data: string } };

// ── Provider factory ─────────────────────────────────────────

/** Gemini through the Generative Language REST API. */
export function createGoogleClient(
  apiKey: string,
  model?: string,
  baseUrl?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const generateUrl = `${(baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')}/models/${resolvedModel}:generateContent`;

  async function generateContent(
    systemPrompt: string,
    parts: readonly Part[],
    options: GenerateOptions | undefined,
  ): Promise<string> {
    const signal = options?.signal;

    for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
      const response = await fetch(generateUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey,
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: systemPrompt }] },
          contents: [{ role: 'user', parts }],
          generationConfig: { temperature: 0 },
        }),
        signal: signal ?? null,
      });

      if (response.status === 429) {
        const waitMs = (attempt + 1) * 5000;
        log.warn(`[llm] Gemini rate limited, waiting ${String(waitMs / 1000)}s...`);
        await delay(waitMs, signal);
        continue;
      }

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Gemini API error (${String(response.status)}): ${body}`);
      }

      const body: unknown = await response.json();
      const [candidate] = generateResponseSchema.parse(body).candidates;
      return candidate.content.parts.map((p) => p.text ?? '').join('');
    }

    throw new Error('Gemini API: max retries exceeded due to rate limiting');
  }

  return {
    generate(systemPrompt, userPrompt, options) {
      return generateContent(systemPrompt, [{ text: userPrompt }], options);
    },

    generateWithImage(systemPrompt, userPrompt, imageBase64, mimeType, options) {
      return generateContent(
        systemPrompt,
        [{ inlineData: { mimeType, data: imageBase64 } }, { text: userPrompt }],
        options,
      );
    },
  };
}
