#!/usr/bin/env node

/**
 * navpilot CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand } from './run.js';

const program = new Command();

program
  .name('navpilot')
  .description(
    'Give a browser agent a task in plain language. It plans each step with an LLM and carries it out with Playwright.',
  )
  .version('0.1.0');

registerRunCommand(program);

await program.parseAsync();
