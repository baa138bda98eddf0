import { describe, it, expect } from 'vitest';
import { Command } from 'commander';

import { EXIT_CODES, exitCodeFor, registerRunCommand } from './run.js';

describe('exitCodeFor', () => {
  it('maps each outcome to its exit code', () => {
    expect(exitCodeFor({ status: 'succeeded', result: 'ok' })).toBe(EXIT_CODES.SUCCEEDED);
    expect(exitCodeFor({ status: 'failed', reason: 'StepLimitExceeded', message: 'x' })).toBe(
      EXIT_CODES.FAILED,
    );
    expect(exitCodeFor({ status: 'cancelled', reason: 'user' })).toBe(EXIT_CODES.CANCELLED);
  });
});

describe('registerRunCommand', () => {
  it('adds the run command and its options', () => {
    const program = new Command();
    registerRunCommand(program);

    const run = program.commands.find((c) => c.name() === 'run');
    expect(run).toBeDefined();
    expect(run?.options.map((o) => o.long)).toEqual([
      '--url',
      '--max-steps',
      '--step-timeout',
      '--timeout',
      '--headless',
      '--no-headless',
      '--config',
      '--provider',
      '--model',
      '--output',
      '--json',
      '--allowed-domain',
    ]);
  });
});
