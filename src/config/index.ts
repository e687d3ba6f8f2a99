/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export {
  TIMEOUTS,
  LIMITS,
  BUILTINS,
  SCRIPT_DENYLIST,
} from './defaults.js';
export {
  loadConfigFile,
  resolveConfig,
  parseDocument,
  DEFAULT_CONFIG_PATH,
} from './loader.js';
