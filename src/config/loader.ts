import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import type { SessionRequirementsInput } from '../schema/session.js';

export const DEFAULT_CONFIG_FILE = '.navpilot.yaml';

// ── Config file ─────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Return an empty config instead of throwing when the file does not exist. */
  optional?: boolean | undefined;
}

/**
 * Load and validate a `.navpilot.yaml` (or JSON) config file.
 * Throws if the file is unreadable or does not match the schema.
 */
export async function loadConfigFile(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (options.optional && isMissingFile(err)) return {};
    throw err;
  }

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  // An empty YAML document parses to null
  return fileConfigSchema.parse(parsed ?? {});
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ── Environment ─────────────────────────────────────────────

/** Browser settings taken from the environment (`CHROME_PATH`, `CHROME_USER_DATA`). */
export function loadBrowserEnv(
  env: NodeJS.ProcessEnv = process.env,
): SessionRequirementsInput {
  const chromePath = nonEmpty(env['CHROME_PATH']);
  const userDataDir = nonEmpty(env['CHROME_USER_DATA']);

  return {
    ...(chromePath !== undefined ? { chromePath } : {}),
    ...(userDataDir !== undefined ? { userDataDir } : {}),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
