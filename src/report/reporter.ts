import type { RunOutcome, RunSummary, Step } from '../schema/index.js';
import { describeAction } from '../schema/index.js';

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(value: unknown): string {
  return JSON.stringify(value, sortedReplacer, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunSummary): string {
  const lines: string[] = [];

  lines.push('# Agent Run Report');
  lines.push('');
  lines.push('| Field | Value |');
  lines.push('|-------|-------|');
  lines.push(`| **Task** | ${escapeMarkdownCell(run.instruction)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Slot** | ${escapeMarkdownCell(run.slot)} |`);
  lines.push(`| **Started** | ${run.createdAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Outcome** | ${describeOutcome(run.outcome)} |`);
  lines.push('');

  if (run.outcome.status === 'succeeded') {
    lines.push('## Result');
    lines.push('');
    lines.push(run.outcome.result);
    lines.push('');
  }

  lines.push('## Steps');
  lines.push('');

  if (run.steps.length === 0) {
    lines.push('_No steps recorded._');
    lines.push('');
    return lines.join('\n');
  }

  lines.push('| # | Action | Page | Status |');
  lines.push('|---|--------|------|--------|');

  for (const step of run.steps) {
    lines.push(
      `| ${String(step.sequence)} | ${escapeMarkdownCell(actionLabel(step))} | ${escapeMarkdownCell(step.observation?.url ?? '')} | ${escapeMarkdownCell(stepStatus(step))} |`,
    );
  }
  lines.push('');

  const withProblems = run.steps.filter(
    (s) => s.error !== undefined || s.decideErrors.length > 0,
  );
  if (withProblems.length > 0) {
    lines.push('## Errors');
    lines.push('');
    for (const step of withProblems) {
      lines.push(`### Step ${String(step.sequence)}`);
      lines.push('');
      for (const message of step.decideErrors) {
        lines.push(`- model: ${message}`);
      }
      if (step.error && !step.decideErrors.includes(step.error.message)) {
        lines.push(`- ${step.error.kind}${step.error.fatal ? ' (fatal)' : ''}: ${step.error.message}`);
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

export function describeOutcome(outcome: RunOutcome): string {
  switch (outcome.status) {
    case 'succeeded':
      return '**SUCCEEDED**';
    case 'failed':
      return `**FAILED** (${outcome.reason}): ${escapeMarkdownCell(outcome.message)}`;
    case 'cancelled':
      return `**CANCELLED** (${outcome.reason})`;
  }
}

function actionLabel(step: Step): string {
  if (step.action) return describeAction(step.action);
  return step.error ? '(no action)' : 'done';
}

function stepStatus(step: Step): string {
  if (!step.error) return 'ok';
  return step.error.fatal ? `fatal: ${step.error.kind}` : step.error.kind;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
