/**
 * Library entry point. Parse, validate and execute routines
 * programmatically; the CLI in `cli/main.ts` is a thin layer over this.
 */

export * from './schema/index.js';
export * from './placeholders/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './report/index.js';
export {
  TIMEOUTS,
  LIMITS,
  BUILTINS,
  SCRIPT_DENYLIST,
  loadConfigFile,
  resolveConfig,
  parseDocument,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export { withTimeout, TimeoutError } from './utils/timeout.js';
