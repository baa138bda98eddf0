import path from 'node:path';

import type { Command } from 'commander';

import type {
  FileConfig,
  LLMProvider,
  RetryPolicy,
  RunOutcome,
  RunSummary,
  SessionRequirementsInput,
} from '../schema/index.js';
import { llmProviderSchema } from '../schema/index.js';
import { BrowserManager, createPlaywrightSession } from '../browser/index.js';
import { AgentManager, errorMessage } from '../core/index.js';
import type { ModelClientFactory } from '../core/index.js';
import { createLLMClient, createLLMModelClient, loadLLMConfig } from '../llm/index.js';
import type { LLMConfig } from '../llm/index.js';
import { createFileRecordingSink, serializeJSON } from '../report/index.js';
import {
  DEFAULT_CONFIG_FILE,
  LIMITS,
  RETENTION,
  RETRY,
  TIMEOUTS,
  loadBrowserEnv,
  loadConfigFile,
} from '../config/index.js';
import * as log from '../utils/logger.js';

const CLI_SLOT = 'cli';

export const EXIT_CODES = {
  SUCCEEDED: 0,
  FAILED: 1,
  CANCELLED: 2,
  ERROR: 4,
} as const;

// ── Options ──────────────────────────────────────────────────

interface RunOptions {
  url?: string;
  maxSteps?: string;
  stepTimeout?: string;
  timeout?: string;
  headless?: boolean;
  config?: string;
  provider?: string;
  model?: string;
  output?: string;
  json?: true;
  allowedDomain?: string[];
}

function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

function secondsToMs(value: string | undefined, flag: string): number | undefined {
  const seconds = parsePositiveInt(value, flag);
  return seconds === undefined ? undefined : seconds * 1000;
}

// ── Config merge ─────────────────────────────────────────────
// Precedence: CLI flags, then config file, then env, then defaults.

function resolveLLMConfig(opts: RunOptions, file: FileConfig): LLMConfig {
  const provider: LLMProvider | undefined =
    opts.provider !== undefined ? llmProviderSchema.parse(opts.provider) : file.provider;

  const env = loadLLMConfig(
    provider !== undefined ? { ...process.env, LLM_PROVIDER: provider } : process.env,
  );
  const model = opts.model ?? file.model ?? env.model;

  return {
    ...env,
    ...(model !== undefined ? { model } : {}),
  };
}

function resolveRequirements(opts: RunOptions, file: FileConfig): SessionRequirementsInput {
  const requirements: SessionRequirementsInput = {
    ...loadBrowserEnv(),
    ...file.browser,
  };
  if (opts.headless !== undefined) requirements.headless = opts.headless;
  return requirements;
}

function resolveRetry(file: FileConfig): RetryPolicy {
  return {
    budget: file.retry?.budget ?? RETRY.BUDGET,
    baseDelayMs: file.retry?.baseDelayMs ?? RETRY.BASE_DELAY,
    maxDelayMs: file.retry?.maxDelayMs ?? RETRY.MAX_DELAY,
  };
}

// ── Output ───────────────────────────────────────────────────

export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome.status) {
    case 'succeeded':
      return EXIT_CODES.SUCCEEDED;
    case 'failed':
      return EXIT_CODES.FAILED;
    case 'cancelled':
      return EXIT_CODES.CANCELLED;
  }
}

function outcomeLine(outcome: RunOutcome): string {
  switch (outcome.status) {
    case 'succeeded':
      return `succeeded: ${outcome.result}`;
    case 'failed':
      return `failed (${outcome.reason}): ${outcome.message}`;
    case 'cancelled':
      return `cancelled (${outcome.reason})`;
  }
}

function printSummary(summary: RunSummary): void {
  const failedSteps = summary.steps.filter((s) => s.error !== undefined).length;

  process.stderr.write(`\n--- navpilot result ---\n`);
  process.stderr.write(`Task:    ${summary.instruction}\n`);
  process.stderr.write(`Outcome: ${outcomeLine(summary.outcome)}\n`);
  process.stderr.write(
    `Steps:   ${String(summary.steps.length)} (${String(failedSteps)} with errors)\n`,
  );
  process.stderr.write(`Time:    ${(summary.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Run ID:  ${summary.runId}\n\n`);
}

// ── Command ──────────────────────────────────────────────────

async function runTask(instruction: string, opts: RunOptions): Promise<number> {
  const file = await loadConfigFile(opts.config ?? DEFAULT_CONFIG_FILE, {
    optional: opts.config === undefined,
  });

  const llmConfig = resolveLLMConfig(opts, file);
  const requirements = resolveRequirements(opts, file);
  const outputDir = opts.output ?? file.recording?.dir;
  const allowedDomains = opts.allowedDomain ?? file.allowedDomains;

  const modelFactory: ModelClientFactory = (config) =>
    createLLMModelClient(createLLMClient({ ...llmConfig, ...config.llm }));

  const browsers = new BrowserManager(createPlaywrightSession, {
    ...file.pool,
    defaultRequirements: requirements,
  });
  const agents = new AgentManager(browsers, modelFactory, {
    runTimeoutMs: secondsToMs(opts.timeout, '--timeout') ?? file.runTimeoutMs ?? TIMEOUTS.RUN_TIMEOUT,
    acquireTimeoutMs: file.acquireTimeoutMs ?? TIMEOUTS.ACQUIRE_TIMEOUT,
    historyRetentionMs: file.historyRetentionMs ?? RETENTION.HISTORY,
    retry: resolveRetry(file),
    recordingSink:
      outputDir !== undefined ? createFileRecordingSink(path.resolve(outputDir)) : undefined,
    defaultRequirements: requirements,
  });

  const onInterrupt = (): void => {
    const runId = agents.activeRun(CLI_SLOT);
    if (runId === undefined) return;
    log.warn('Interrupted, cancelling run');
    agents.cancel(runId);
  };
  process.on('SIGINT', onInterrupt);

  try {
    const runId = await agents.start(CLI_SLOT, {
      instruction,
      maxSteps:
        parsePositiveInt(opts.maxSteps, '--max-steps') ?? file.maxSteps ?? LIMITS.MAX_STEPS,
      stepTimeoutMs:
        secondsToMs(opts.stepTimeout, '--step-timeout') ??
        file.stepTimeoutMs ??
        TIMEOUTS.STEP_TIMEOUT,
      ...(opts.url !== undefined ? { startUrl: opts.url } : {}),
      ...(allowedDomains !== undefined ? { constraints: { allowedDomains } } : {}),
    });

    const outcome = await agents.await(runId);
    const summary = agents.summary(runId);

    if (summary !== null) {
      if (opts.json) process.stdout.write(serializeJSON(summary) + '\n');
      printSummary(summary);
    }
    if (outputDir !== undefined) {
      log.info(`Artifacts written to ${path.resolve(outputDir, runId)}`);
    }

    return exitCodeFor(outcome);
  } finally {
    process.off('SIGINT', onInterrupt);
    await agents.shutdown();
    await browsers.shutdown();
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Carry out a natural-language task in a browser')
    .argument('<task>', 'What the agent should do')
    .option('--url <url>', 'Page to start from')
    .option('--max-steps <n>', `Maximum decide/act cycles (default ${String(LIMITS.MAX_STEPS)})`)
    .option(
      '--step-timeout <seconds>',
      `Timeout per model call and per action (default ${String(TIMEOUTS.STEP_TIMEOUT / 1000)})`,
    )
    .option(
      '--timeout <seconds>',
      `Total run timeout (default ${String(TIMEOUTS.RUN_TIMEOUT / 1000)})`,
    )
    .option('--headless', 'Run the browser headless')
    .option('--no-headless', 'Show the browser window')
    .option('--config <path>', `Path to config file (default ${DEFAULT_CONFIG_FILE})`)
    .option('--provider <name>', 'LLM provider: anthropic, openai, google, mistral, ollama or mock')
    .option('--model <name>', 'Model name for the provider')
    .option('--output <dir>', 'Write step artifacts and a report under this directory')
    .option('--json', 'Print the run summary as JSON to stdout')
    .option('--allowed-domain <domains...>', 'Restrict navigation to these domains')
    .action(async (instruction: string, opts: RunOptions) => {
      try {
        process.exitCode = await runTask(instruction, opts);
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CODES.ERROR;
      }
    });
}
