/**
 * Configuration module.
 * Defaults, the validated config file and environment loaders. Callers
 * merge them: CLI flags, then file, then env, then defaults.
 */

export {
  TIMEOUTS,
  LIMITS,
  RETRY,
  RETENTION,
  TOKEN_GUARDS,
  BROWSER_DEFAULTS,
} from './defaults.js';
export { DEFAULT_CONFIG_FILE, loadConfigFile, loadBrowserEnv } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
