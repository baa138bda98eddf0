import { z } from 'zod';

import { sessionRequirementsSchema } from './session.js';

// ── Provider ────────────────────────────────────────────────

export const llmProviderSchema = z.enum([
  'anthropic',
  'openai',
  'google',
  'mistral',
  'ollama',
  'mock',
]);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

// ── Retry policy ────────────────────────────────────────────

export const retryPolicySchema = z.object({
  budget: z.number().int().nonnegative(),
  baseDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
});

export type RetryPolicy = z.infer<typeof retryPolicySchema>;

// ── Session pool ────────────────────────────────────────────

export const poolConfigSchema = z.object({
  maxSessions: z.number().int().positive(),
  minIdleSessions: z.number().int().nonnegative(),
  idleTimeoutMs: z.number().int().positive(),
  healthCheckTimeoutMs: z.number().int().positive(),
  provisionRetries: z.number().int().nonnegative(),
  shutdownGraceMs: z.number().int().nonnegative(),
});

export type PoolConfig = z.infer<typeof poolConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
  maxSteps: z.number().int().positive().optional(),
  stepTimeoutMs: z.number().int().positive().optional(),
  runTimeoutMs: z.number().int().positive().optional(),
  acquireTimeoutMs: z.number().int().positive().optional(),
  historyRetentionMs: z.number().int().nonnegative().optional(),
  allowedDomains: z.array(z.string().min(1)).optional(),
  retry: retryPolicySchema.partial().optional(),
  pool: poolConfigSchema.partial().optional(),
  browser: sessionRequirementsSchema.partial().optional(),
  recording: z
    .object({
      dir: z.string().min(1),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
