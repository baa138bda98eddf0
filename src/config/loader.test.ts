import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ZodError } from 'zod';

import { loadBrowserEnv, loadConfigFile } from './loader.js';

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'navpilot-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const file = path.join(dir, name);
    await writeFile(file, content, 'utf-8');
    return file;
  }

  it('reads YAML', async () => {
    const file = await write(
      '.navpilot.yaml',
      [
        'provider: ollama',
        'model: llama3.1',
        'maxSteps: 12',
        'allowedDomains:',
        '  - example.com',
        'pool:',
        '  maxSessions: 2',
        'browser:',
        '  headless: false',
        'recording:',
        '  dir: ./recordings',
      ].join('\n'),
    );

    await expect(loadConfigFile(file)).resolves.toEqual({
      provider: 'ollama',
      model: 'llama3.1',
      maxSteps: 12,
      allowedDomains: ['example.com'],
      pool: { maxSessions: 2 },
      browser: { headless: false },
      recording: { dir: './recordings' },
    });
  });

  it('reads JSON', async () => {
    const file = await write('config.json', '{"retry":{"budget":1},"runTimeoutMs":60000}');

    await expect(loadConfigFile(file)).resolves.toEqual({
      retry: { budget: 1 },
      runTimeoutMs: 60000,
    });
  });

  it('treats an empty file as an empty config', async () => {
    const file = await write('empty.yaml', '');

    await expect(loadConfigFile(file)).resolves.toEqual({});
  });

  it('rejects values that do not match the schema', async () => {
    const file = await write('bad.yaml', 'provider: gemini\n');

    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ZodError);
  });

  it('returns an empty config for a missing optional file', async () => {
    const missing = path.join(dir, 'absent.yaml');

    await expect(loadConfigFile(missing, { optional: true })).resolves.toEqual({});
    await expect(loadConfigFile(missing)).rejects.toThrow(/ENOENT/);
  });
});

describe('loadBrowserEnv', () => {
  it('maps the Chrome variables', () => {
    expect(
      loadBrowserEnv({ CHROME_PATH: '/opt/chrome/chrome', CHROME_USER_DATA: '/tmp/profile' }),
    ).toEqual({ chromePath: '/opt/chrome/chrome', userDataDir: '/tmp/profile' });
  });

  it('ignores unset and blank values', () => {
    expect(loadBrowserEnv({ CHROME_PATH: '  ' })).toEqual({});
  });
});
