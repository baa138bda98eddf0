import type { Page } from 'playwright';

import type { ConsoleEntry, NetworkFailure, PageCapture } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';

// ── Buffer ───────────────────────────────────────────────────

const CAPS: Record<keyof PageCapture, number> = {
  consoleEntries: TOKEN_GUARDS.MAX_CONSOLE_ERRORS,
  networkFailures: TOKEN_GUARDS.MAX_NETWORK_ERRORS,
  pageErrors: TOKEN_GUARDS.MAX_CONSOLE_ERRORS,
};

function emptyCapture(): PageCapture {
  return { consoleEntries: [], networkFailures: [], pageErrors: [] };
}

export interface CaptureBuffer {
  console(entry: ConsoleEntry): void;
  networkFailure(failure: NetworkFailure): void;
  pageError(message: string): void;
  /** Everything recorded since the last flush; the buffer starts over. */
  flush(): PageCapture;
}

/** Entries past each field's cap are dropped, not queued. */
export function createCaptureBuffer(): CaptureBuffer {
  let current = emptyCapture();

  function add<T>(list: T[], cap: number, item: T): void {
    if (list.length < cap) list.push(item);
  }

  return {
    console: (entry) => add(current.consoleEntries, CAPS.consoleEntries, entry),
    networkFailure: (failure) => add(current.networkFailures, CAPS.networkFailures, failure),
    pageError: (message) => add(current.pageErrors, CAPS.pageErrors, message),
    flush() {
      const captured = current;
      current = emptyCapture();
      return captured;
    },
  };
}

// ── Page wiring ──────────────────────────────────────────────

const CONSOLE_LEVELS: Record<string, ConsoleEntry['level'] | undefined> = {
  error: 'error',
  warning: 'warn',
};

/** Listeners live as long as the page; flush at every action boundary. */
export function attachCapture(page: Page): CaptureBuffer {
  const buffer = createCaptureBuffer();

  page.on('console', (msg) => {
    const level = CONSOLE_LEVELS[msg.type()];
    if (level) buffer.console({ level, text: msg.text() });
  });
  page.on('response', (response) => {
    if (response.status() >= 400) {
      buffer.networkFailure({
        url: response.url(),
        status: response.status(),
        method: response.request().method(),
      });
    }
  });
  page.on('requestfailed', (request) => {
    buffer.networkFailure({ url: request.url(), status: 0, method: request.method() });
  });
  page.on('pageerror', (error) => buffer.pageError(error.message));

  return buffer;
}
