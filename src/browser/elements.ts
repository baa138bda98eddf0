import type { Page } from 'playwright';

import type { InteractiveElement } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';

// ── Public API ───────────────────────────────────────────────

/**
 * List the interactive elements on the current page so the model can
 * pick selectors that exist. Pure DOM extraction.
 */
export async function extractElements(page: Page): Promise<InteractiveElement[]> {
  const elements = await page.evaluate(extractFromDOM);
  return elements.slice(0, TOKEN_GUARDS.MAX_ELEMENTS_IN_PROMPT);
}

// ── Browser-context extraction ───────────────────────────────
// Serialized and executed inside the browser: no outer-scope references.

function extractFromDOM(): InteractiveElement[] {
  const SELECTOR =
    'button, [role="button"], a[href], input:not([type="hidden"]), select, textarea';

  function attr(el: Element, name: string): string | undefined {
    return el.getAttribute(name) ?? undefined;
  }

  function labelOf(el: Element): string | undefined {
    const aria = el.getAttribute('aria-label');
    if (aria) return aria;

    const id = el.getAttribute('id');
    if (id) {
      const label = document.querySelector(`label[for="${CSS.escape(id)}"]`);
      const text = label?.textContent?.trim();
      if (text) return text;
    }

    const text = (el.closest('label') ?? el).textContent?.trim();
    return text ? text.slice(0, 80) : undefined;
  }

  const out: InteractiveElement[] = [];

  document.querySelectorAll(SELECTOR).forEach((el) => {
    const rect = el.getBoundingClientRect();
    if (rect.width === 0 && rect.height === 0) return;

    const tag = el.getAttribute('role') === 'button' ? 'button' : el.tagName.toLowerCase();
    const entry: InteractiveElement = { tag };

    const text = labelOf(el);
    if (text) entry.text = text;
    const testId = attr(el, 'data-testid');
    if (testId) entry.testId = testId;
    const name = attr(el, 'name');
    if (name) entry.name = name;
    const placeholder = attr(el, 'placeholder');
    if (placeholder) entry.placeholder = placeholder;
    const type = attr(el, 'type');
    if (type && tag === 'input') entry.type = type;
    const href = attr(el, 'href');
    if (href && tag === 'a') entry.href = href;
    if (el instanceof HTMLSelectElement) {
      entry.options = Array.from(el.options).map((o) => o.text.trim() || o.value);
    }

    out.push(entry);
  });

  return out;
}
