import { describe, it, expect } from 'vitest';

import { createTask, isUrlAllowed } from './task.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';

describe('createTask', () => {
  it('applies defaults', () => {
    const task = createTask({ instruction: 'Check the opening hours' });

    expect(task).toEqual({
      instruction: 'Check the opening hours',
      maxSteps: LIMITS.MAX_STEPS,
      stepTimeoutMs: TIMEOUTS.STEP_TIMEOUT,
    });
  });

  it('trims the instruction and rejects an empty one', () => {
    expect(createTask({ instruction: '  Book a table  ' }).instruction).toBe('Book a table');
    expect(() => createTask({ instruction: '   ' })).toThrow();
  });

  it('rejects invalid limits and start URLs', () => {
    expect(() => createTask({ instruction: 'x', maxSteps: 0 })).toThrow();
    expect(() => createTask({ instruction: 'x', stepTimeoutMs: 1.5 })).toThrow();
    expect(() => createTask({ instruction: 'x', startUrl: 'not a url' })).toThrow();
  });

  it('freezes the task and its constraints', () => {
    const task = createTask({
      instruction: 'x',
      constraints: { allowedDomains: ['example.com'] },
    });

    expect(Object.isFrozen(task)).toBe(true);
    expect(Object.isFrozen(task.constraints)).toBe(true);
    expect(Object.isFrozen(task.constraints?.allowedDomains)).toBe(true);
  });
});

describe('isUrlAllowed', () => {
  const restricted = createTask({
    instruction: 'x',
    constraints: { allowedDomains: ['Example.com'] },
  });

  it('allows everything without a domain list', () => {
    expect(isUrlAllowed(createTask({ instruction: 'x' }), 'https://anywhere.test/')).toBe(true);
    expect(
      isUrlAllowed(createTask({ instruction: 'x', constraints: { allowedDomains: [] } }), 'https://anywhere.test/'),
    ).toBe(true);
  });

  it('matches the domain and its subdomains case-insensitively', () => {
    expect(isUrlAllowed(restricted, 'https://example.com/a')).toBe(true);
    expect(isUrlAllowed(restricted, 'https://SHOP.example.com/')).toBe(true);
  });

  it('rejects other hosts, lookalikes and unparseable URLs', () => {
    expect(isUrlAllowed(restricted, 'https://example.org/')).toBe(false);
    expect(isUrlAllowed(restricted, 'https://badexample.com/')).toBe(false);
    expect(isUrlAllowed(restricted, 'not a url')).toBe(false);
  });
});
