import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from './client.js';
import type {
  InteractiveElement,
  ModelDecision,
  Observation,
  Step,
  Task,
} from '../schema/index.js';
import { describeAction, modelDecisionSchema } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import { ModelError } from '../core/errors.js';

// ── Capability ───────────────────────────────────────────────

/** Everything the model sees when choosing the next action. */
export interface ConversationState {
  runId: string;
  task: Task;
  steps: readonly Step[];
  lastObservation: Observation | null;
  lastScreenshot?: Buffer | undefined;
  remainingSteps: number;
}

/**
 * Proposes the next action or declares the task done. Errors are thrown.
 * Implementations must honour `signal`; the engine abandons the call
 * when it aborts either way.
 */
export interface ModelClient {
  decide(state: ConversationState, signal: AbortSignal): Promise<ModelDecision>;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

let stepTemplate: Promise<string> | undefined;

function loadStepTemplate(): Promise<string> {
  stepTemplate ??= readFile(path.join(PROMPTS_DIR, 'agent_step.txt'), 'utf-8');
  return stepTemplate;
}

// ── JSON extraction ─────────────────────────────────────────

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// ── Pre-validation fixups ────────────────────────────────────
// Models drift from the format: `{"done": true, "summary": ...}`,
// invented selector strategies, missing descriptions.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fixupSelector(selector: Record<string, unknown>): void {
  const strategy = selector['strategy'];
  const value = selector['value'];
  if (typeof strategy !== 'string' || typeof value !== 'string') return;
  if (['testid', 'role', 'text', 'css'].includes(strategy)) return;

  switch (strategy) {
    case 'placeholder':
      selector['strategy'] = 'css';
      selector['value'] = `input[placeholder='${value}']`;
      break;
    case 'name':
      selector['strategy'] = 'css';
      selector['value'] = `[name='${value}']`;
      break;
    case 'id':
      selector['strategy'] = 'css';
      selector['value'] = `#${value}`;
      break;
    case 'label':
      selector['strategy'] = 'text';
      break;
    default:
      selector['strategy'] = 'css';
      selector['value'] = `[${strategy}='${value}']`;
      break;
  }
}

export function fixupRawDecision(parsed: unknown): unknown {
  if (!isRecord(parsed)) return parsed;

  if (parsed['type'] === undefined && parsed['done'] === true) {
    return {
      type: 'done',
      result: String(parsed['result'] ?? parsed['summary'] ?? ''),
    };
  }

  if (parsed['type'] === undefined && isRecord(parsed['action'])) {
    parsed['type'] = 'action';
  }

  const action = parsed['action'];
  if (parsed['type'] === 'action' && isRecord(action)) {
    if (!action['description'] && typeof action['type'] === 'string') {
      action['description'] = `${action['type']} action`;
    }
    const selector = action['selector'];
    if (isRecord(selector)) {
      fixupSelector(selector);
    }
  }

  return parsed;
}

export function parseDecision(raw: string): ModelDecision {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch {
    throw new ModelError(`Model returned invalid JSON: ${raw.slice(0, 200)}`);
  }

  const result = modelDecisionSchema.safeParse(fixupRawDecision(parsed));
  if (!result.success) {
    throw new ModelError(`Model response validation failed: ${result.error.message}`);
  }

  return result.data;
}

// ── History formatting ──────────────────────────────────────

export function formatHistory(steps: readonly Step[]): string {
  if (steps.length === 0) return '(no actions taken yet)';

  return steps
    .slice(-TOKEN_GUARDS.MAX_HISTORY_IN_PROMPT)
    .map((step) => {
      const label = step.action ? describeAction(step.action) : 'no action';
      if (step.error) {
        return `${String(step.sequence + 1)}. [${label}] ✗ ${step.error.message}`;
      }
      const where = step.observation ? ` → ${step.observation.url}` : '';
      return `${String(step.sequence + 1)}. [${label}] ✓${where}`;
    })
    .join('\n');
}

// ── Element formatting ──────────────────────────────────────

export function formatElement(el: InteractiveElement): string {
  const parts = [`<${el.tag}`];

  if (el.type) parts.push(`type="${el.type}"`);
  if (el.testId) parts.push(`data-testid="${el.testId}"`);
  if (el.name) parts.push(`name="${el.name}"`);
  if (el.placeholder) parts.push(`placeholder="${el.placeholder}"`);
  if (el.href) parts.push(`href="${el.href}"`);

  parts.push('>');

  if (el.text) parts.push(el.text);
  if (el.options && el.options.length > 0) {
    parts.push(`options=[${el.options.join(', ')}]`);
  }

  return parts.join(' ');
}

// ── Prompt building ─────────────────────────────────────────

export async function buildStepPrompt(state: ConversationState): Promise<string> {
  const template = await loadStepTemplate();
  const obs = state.lastObservation;

  const values: Record<string, string> = {
    instruction: state.task.instruction,
    additionalInfo: state.task.constraints?.additionalInfo ?? '(none)',
    startUrl: state.task.startUrl ?? '(none given)',
    url: obs?.url ?? 'about:blank',
    title: obs?.title ?? '',
    elements:
      obs?.elements && obs.elements.length > 0
        ? obs.elements.map(formatElement).join('\n')
        : '(none listed)',
    visibleText: (obs?.visibleText ?? '').slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS),
    history: formatHistory(state.steps),
    remaining: String(state.remainingSteps),
  };

  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}

// ── LLM-backed model client ─────────────────────────────────

export interface LLMModelClientOptions {
  /** Send the last screenshot when the provider supports images. */
  useVision?: boolean | undefined;
}

export function createLLMModelClient(
  client: LLMClient,
  options: LLMModelClientOptions = {},
): ModelClient {
  const useVision = options.useVision ?? true;

  return {
    async decide(state: ConversationState, signal: AbortSignal): Promise<ModelDecision> {
      const prompt = await buildStepPrompt(state);
      const goal = state.task.instruction;

      let raw: string;
      if (useVision && state.lastScreenshot && client.generateWithImage) {
        raw = await client.generateWithImage(
          prompt,
          goal,
          state.lastScreenshot.toString('base64'),
          'image/png',
          { signal },
        );
      } else {
        raw = await client.generate(prompt, goal, { signal });
      }

      return parseDecision(raw);
    },
  };
}
