import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { RunSummary, Step } from '../schema/index.js';
import { generateMarkdown, serializeJSON } from './reporter.js';

// ── Capability ───────────────────────────────────────────────

/**
 * Write-only destination for per-step artifacts and finished runs.
 * The engine never reads back from it.
 */
export interface RecordingSink {
  recordStep(runId: string, step: Step, screenshot?: Buffer): Promise<void>;
  recordRun(summary: RunSummary): Promise<void>;
}

// ── Filesystem sink ──────────────────────────────────────────

/**
 * Layout per run:
 *   <rootDir>/<runId>/step-<n>.json
 *   <rootDir>/<runId>/step-<n>.png
 *   <rootDir>/<runId>/history.json
 *   <rootDir>/<runId>/report.md
 */
export function createFileRecordingSink(rootDir: string): RecordingSink {
  async function runDir(runId: string): Promise<string> {
    const dir = path.join(rootDir, runId);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  return {
    async recordStep(runId: string, step: Step, screenshot?: Buffer): Promise<void> {
      const dir = await runDir(runId);
      const base = `step-${String(step.sequence)}`;

      await writeFile(path.join(dir, `${base}.json`), serializeJSON(step) + '\n', 'utf-8');
      if (screenshot) {
        await writeFile(path.join(dir, `${base}.png`), screenshot);
      }
    },

    async recordRun(summary: RunSummary): Promise<void> {
      const dir = await runDir(summary.runId);

      await writeFile(path.join(dir, 'history.json'), serializeJSON(summary) + '\n', 'utf-8');
      await writeFile(path.join(dir, 'report.md'), generateMarkdown(summary), 'utf-8');
    },
  };
}

// ── In-memory sink ───────────────────────────────────────────

export interface MemoryRecordingSink extends RecordingSink {
  readonly steps: Map<string, Step[]>;
  readonly screenshots: Map<string, Buffer>;
  readonly runs: RunSummary[];
}

/** Keeps everything in maps; screenshots are keyed `<runId>/<sequence>`. */
export function createMemoryRecordingSink(): MemoryRecordingSink {
  const steps = new Map<string, Step[]>();
  const screenshots = new Map<string, Buffer>();
  const runs: RunSummary[] = [];

  return {
    steps,
    screenshots,
    runs,

    async recordStep(runId: string, step: Step, screenshot?: Buffer): Promise<void> {
      const list = steps.get(runId) ?? [];
      list.push(step);
      steps.set(runId, list);
      if (screenshot) {
        screenshots.set(`${runId}/${String(step.sequence)}`, screenshot);
      }
    },

    async recordRun(summary: RunSummary): Promise<void> {
      runs.push(summary);
    },
  };
}
