import { z } from 'zod';

// ── SelectorHint ──────────────────────────────────────────────

export const selectorStrategySchema = z.enum(['testid', 'role', 'text', 'css']);

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

export const selectorHintSchema = z.object({
  strategy: selectorStrategySchema,
  value: z.string().min(1),
  role: z.string().optional(),
  name: z.string().optional(),
});

export type SelectorHint = z.infer<typeof selectorHintSchema>;

// ── Action type discriminator ─────────────────────────────────

export const actionTypeSchema = z.enum([
  'navigate',
  'click',
  'type',
  'select',
  'press_key',
  'scroll',
  'wait',
  'go_back',
]);

export type ActionType = z.infer<typeof actionTypeSchema>;

// ── Individual action schemas ─────────────────────────────────

const baseFields = {
  description: z.string().min(1),
};

export const navigateActionSchema = z.object({
  ...baseFields,
  type: z.literal('navigate'),
  url: z.string().url(),
});

export const clickActionSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  selector: selectorHintSchema,
});

export const typeActionSchema = z.object({
  ...baseFields,
  type: z.literal('type'),
  selector: selectorHintSchema,
  value: z.string(),
  submit: z.boolean().optional(),
});

export const selectActionSchema = z.object({
  ...baseFields,
  type: z.literal('select'),
  selector: selectorHintSchema,
  value: z.string(),
});

export const pressKeyActionSchema = z.object({
  ...baseFields,
  type: z.literal('press_key'),
  key: z.string().min(1),
});

export const scrollActionSchema = z.object({
  ...baseFields,
  type: z.literal('scroll'),
  direction: z.enum(['up', 'down']),
  amount: z.number().int().positive().optional(),
});

export const waitActionSchema = z.object({
  ...baseFields,
  type: z.literal('wait'),
  selector: selectorHintSchema.optional(),
  ms: z.number().int().nonnegative().optional(),
});

export const goBackActionSchema = z.object({
  ...baseFields,
  type: z.literal('go_back'),
});

// ── Union schema ──────────────────────────────────────────────

export const browserActionSchema = z.discriminatedUnion('type', [
  navigateActionSchema,
  clickActionSchema,
  typeActionSchema,
  selectActionSchema,
  pressKeyActionSchema,
  scrollActionSchema,
  waitActionSchema,
  goBackActionSchema,
]);

export type BrowserAction = z.infer<typeof browserActionSchema>;

export type NavigateAction = z.infer<typeof navigateActionSchema>;
export type ClickAction = z.infer<typeof clickActionSchema>;
export type TypeAction = z.infer<typeof typeActionSchema>;
export type SelectAction = z.infer<typeof selectActionSchema>;
export type PressKeyAction = z.infer<typeof pressKeyActionSchema>;
export type ScrollAction = z.infer<typeof scrollActionSchema>;
export type WaitAction = z.infer<typeof waitActionSchema>;
export type GoBackAction = z.infer<typeof goBackActionSchema>;

// ── Description helper ────────────────────────────────────────

/** One-line summary used in prompts, logs and reports. */
export function describeAction(action: BrowserAction): string {
  switch (action.type) {
    case 'navigate':
      return `navigate ${action.url}`;
    case 'click':
      return `click ${action.selector.strategy}="${action.selector.value}"`;
    case 'type':
      return `type ${action.selector.strategy}="${action.selector.value}"`;
    case 'select':
      return `select ${action.selector.strategy}="${action.selector.value}"`;
    case 'press_key':
      return `press_key ${action.key}`;
    case 'scroll':
      return `scroll ${action.direction}`;
    case 'wait':
      return action.selector
        ? `wait ${action.selector.strategy}="${action.selector.value}"`
        : `wait ${String(action.ms ?? 0)}ms`;
    case 'go_back':
      return 'go_back';
  }
}
