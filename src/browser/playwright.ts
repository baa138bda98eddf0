import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { chromium } from 'playwright';
import type { Browser, BrowserContext, Locator, Page } from 'playwright';

import type {
  ActionResult,
  BrowserAction,
  SelectorHint,
  SessionRequirements,
  WaitAction,
} from '../schema/index.js';
import { TIMEOUTS, TOKEN_GUARDS } from '../config/defaults.js';
import {
  ActionError,
  CancelledError,
  SessionCrashedError,
  errorMessage,
  isSessionFatal,
} from '../core/errors.js';
import * as log from '../utils/logger.js';
import { withTimeout } from '../utils/timing.js';
import { attachCapture } from './capture.js';
import { extractElements } from './elements.js';
import type { BrowserSession, HealthStatus } from './session.js';

const SCROLL_STEP_PX = 600;

// ── Launch ───────────────────────────────────────────────────

interface LaunchedBrowser {
  /** Null for a persistent context whose browser Playwright does not expose. */
  browser: Browser | null;
  context: BrowserContext;
}

function chromiumArgs(requirements: SessionRequirements): string[] {
  const args = [
    ...requirements.extraArgs,
    `--window-size=${String(requirements.windowWidth)},${String(requirements.windowHeight)}`,
  ];
  if (requirements.disableSecurity) {
    args.push('--disable-web-security', '--disable-features=IsolateOrigins,site-per-process');
  }
  return args;
}

function contextOptions(requirements: SessionRequirements) {
  return {
    viewport: { width: requirements.windowWidth, height: requirements.windowHeight },
    ignoreHTTPSErrors: requirements.disableSecurity,
    bypassCSP: requirements.disableSecurity,
    ...(requirements.recordingsDir !== undefined
      ? {
          recordVideo: {
            dir: requirements.recordingsDir,
            size: { width: requirements.windowWidth, height: requirements.windowHeight },
          },
        }
      : {}),
  };
}

async function launch(requirements: SessionRequirements): Promise<LaunchedBrowser> {
  if (requirements.recordingsDir !== undefined) {
    await mkdir(requirements.recordingsDir, { recursive: true });
  }

  // Attach to a browser someone else runs
  if (requirements.cdpUrl !== undefined) {
    const browser = await chromium.connectOverCDP(requirements.cdpUrl);
    const context =
      browser.contexts()[0] ?? (await browser.newContext(contextOptions(requirements)));
    return { browser, context };
  }

  const launchOptions = {
    headless: requirements.headless,
    args: chromiumArgs(requirements),
    ...(requirements.chromePath !== undefined
      ? { executablePath: requirements.chromePath }
      : {}),
  };

  // Reuse a profile directory (cookies, logins)
  if (requirements.userDataDir !== undefined) {
    const context = await chromium.launchPersistentContext(requirements.userDataDir, {
      ...launchOptions,
      ...contextOptions(requirements),
    });
    return { browser: context.browser(), context };
  }

  const browser = await chromium.launch(launchOptions);
  const context = await browser.newContext(contextOptions(requirements));
  return { browser, context };
}

// ── Selector resolution ──────────────────────────────────────

function resolveSelector(page: Page, hint: SelectorHint): Locator {
  switch (hint.strategy) {
    case 'testid':
      return page.getByTestId(hint.value).first();

    case 'role': {
      if (!hint.role) {
        throw new ActionError('Selector strategy "role" needs a "role" field (e.g. "button")');
      }
      // Playwright accepts any ARIA role string at runtime; the overload wants the literal union.
      const role = hint.role as Parameters<Page['getByRole']>[0];
      return page
        .getByRole(role, hint.name !== undefined ? { name: hint.name } : {})
        .first();
    }

    case 'text':
      return page.getByText(hint.value).first();

    case 'css':
      return page.locator(hint.value).first();
  }
}

// ── Action dispatch ──────────────────────────────────────────

async function performAction(page: Page, action: BrowserAction): Promise<void> {
  const timeout = TIMEOUTS.ACTION_TIMEOUT;

  switch (action.type) {
    case 'navigate':
      await page.goto(action.url, {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
      break;

    case 'click':
      await resolveSelector(page, action.selector).click({ timeout });
      break;

    case 'type': {
      const locator = resolveSelector(page, action.selector);
      await locator.fill(action.value, { timeout });
      if (action.submit) {
        await locator.press('Enter', { timeout });
      }
      break;
    }

    case 'select':
      await resolveSelector(page, action.selector).selectOption(action.value, { timeout });
      break;

    case 'press_key':
      await page.keyboard.press(action.key);
      break;

    case 'scroll': {
      const dy = (action.amount ?? SCROLL_STEP_PX) * (action.direction === 'up' ? -1 : 1);
      await page.mouse.wheel(0, dy);
      break;
    }

    case 'wait':
      await handleWait(page, action);
      break;

    case 'go_back':
      await page.goBack({ timeout: TIMEOUTS.NAVIGATION_TIMEOUT, waitUntil: 'domcontentloaded' });
      break;
  }
}

async function handleWait(page: Page, action: WaitAction): Promise<void> {
  if (action.selector) {
    await resolveSelector(page, action.selector).waitFor({
      state: 'visible',
      timeout: TIMEOUTS.ACTION_TIMEOUT,
    });
  } else if (action.ms !== undefined) {
    await page.waitForTimeout(Math.min(action.ms, TIMEOUTS.ACTION_TIMEOUT));
  }
}

// ── Observation ──────────────────────────────────────────────

async function readVisibleText(page: Page): Promise<string> {
  try {
    const text = await page.innerText('body', { timeout: TIMEOUTS.ACTION_TIMEOUT });
    return text.slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS);
  } catch (err) {
    log.debug(`Could not read page text: ${errorMessage(err)}`);
    return '';
  }
}

async function takeScreenshot(page: Page): Promise<Buffer | undefined> {
  try {
    return await page.screenshot({ type: 'png' });
  } catch (err) {
    log.debug(`Screenshot failed: ${errorMessage(err)}`);
    return undefined;
  }
}

// ── Session factory ──────────────────────────────────────────

/**
 * Launch (or attach to) Chromium and wrap it as a BrowserSession.
 * Used as the BrowserManager's SessionFactory in production.
 */
export async function createPlaywrightSession(
  id: string,
  requirements: SessionRequirements,
): Promise<BrowserSession> {
  const { browser, context } = await launch(requirements);

  let crashed = false;
  browser?.on('disconnected', () => {
    crashed = true;
  });

  if (requirements.tracesDir !== undefined) {
    await mkdir(requirements.tracesDir, { recursive: true });
    await context.tracing.start({ screenshots: true, snapshots: true });
  }

  const page = context.pages()[0] ?? (await context.newPage());
  page.on('crash', () => {
    crashed = true;
  });
  const capture = attachCapture(page);

  return {
    id,

    async execute(action: BrowserAction, signal: AbortSignal): Promise<ActionResult> {
      if (signal.aborted) throw new CancelledError();
      if (crashed) throw new SessionCrashedError(`Session ${id} has crashed`);

      capture.flush();

      try {
        await performAction(page, action);
      } catch (err) {
        if (crashed || isSessionFatal(err)) {
          throw new SessionCrashedError(errorMessage(err));
        }
        throw new ActionError(errorMessage(err));
      }

      const [title, visibleText, elements, screenshot] = await Promise.all([
        page.title().catch((err: unknown) => {
          log.debug(`Could not read page title: ${errorMessage(err)}`);
          return '';
        }),
        readVisibleText(page),
        extractElements(page).catch((err: unknown) => {
          log.debug(`Could not list page elements: ${errorMessage(err)}`);
          return [];
        }),
        takeScreenshot(page),
      ]);

      return {
        observation: {
          url: page.url(),
          title,
          visibleText,
          elements,
          capture: capture.flush(),
        },
        screenshot,
      };
    },

    async healthCheck(): Promise<HealthStatus> {
      if (crashed || page.isClosed()) return 'unhealthy';
      if (browser !== null && !browser.isConnected()) return 'unhealthy';
      try {
        await withTimeout(() => page.evaluate(() => 1), TIMEOUTS.ACTION_TIMEOUT, 'health check');
        return 'healthy';
      } catch (err) {
        log.debug(`Session ${id} failed health check: ${errorMessage(err)}`);
        return 'unhealthy';
      }
    },

    async terminate(): Promise<void> {
      if (requirements.tracesDir !== undefined && !crashed) {
        await context.tracing
          .stop({ path: path.join(requirements.tracesDir, `${id}.zip`) })
          .catch((err: unknown) => {
            log.warn(`Could not save trace for ${id}: ${errorMessage(err)}`);
          });
      }

      await context.close().catch((err: unknown) => {
        log.debug(`Context close for ${id}: ${errorMessage(err)}`);
      });

      // Over CDP this only disconnects; the remote browser keeps running.
      if (browser !== null && browser.isConnected()) {
        await browser.close();
      }
    },
  };
}
