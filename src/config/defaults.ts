/**
 * Default configuration values.
 * All values are overridable via config file, env or CLI flags.
 */

export const TIMEOUTS = {
  STEP_TIMEOUT: 60_000,
  NAVIGATION_TIMEOUT: 15_000,
  ACTION_TIMEOUT: 8_000,
  ACQUIRE_TIMEOUT: 30_000,
  HEALTH_CHECK_TIMEOUT: 5_000,
  RUN_TIMEOUT: 15 * 60_000,
  IDLE_SESSION_TIMEOUT: 5 * 60_000,
  SHUTDOWN_GRACE: 10_000,
} as const;

export const LIMITS = {
  MAX_STEPS: 25,
  MAX_SESSIONS: 4,
  MIN_IDLE_SESSIONS: 0,
  PROVISION_RETRIES: 2,
  SNAPSHOT_RECENT_STEPS: 5,
} as const;

export const RETRY = {
  BUDGET: 3,
  BASE_DELAY: 500,
  MAX_DELAY: 8_000,
} as const;

export const RETENTION = {
  HISTORY: 30 * 60_000,
} as const;

export const TOKEN_GUARDS = {
  MAX_CONSOLE_ERRORS: 20,
  MAX_NETWORK_ERRORS: 10,
  MAX_VISIBLE_TEXT_CHARS: 8_000,
  MAX_HISTORY_IN_PROMPT: 20,
  MAX_ELEMENTS_IN_PROMPT: 80,
} as const;

export const BROWSER_DEFAULTS = {
  WINDOW_WIDTH: 1280,
  WINDOW_HEIGHT: 1100,
} as const;
