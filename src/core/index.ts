/**
 * Core module.
 * Validation, per-run context and the fail-fast operation executor.
 * Browser and HTTP access come in through collaborator interfaces.
 */

export {
  validateRoutine,
  acceptRoutine,
  AcceptedRoutine,
} from './validator.js';
export type { ValidationReport } from './validator.js';
export { ExecutionContext, createExecutionContext } from './context.js';
export { RoutineExecutor, decodeResponseBody } from './executor.js';
export type { ExecutorDeps, RunOptions } from './executor.js';
export {
  validateScript,
  generateEvaluateWrapper,
  compileDenylist,
  parseScriptEnvelope,
  scriptEnvelopeSchema,
  DEFAULT_DENYLIST,
  IIFE_PATTERN,
} from './scriptSafety.js';
export type {
  ScriptCheck,
  ScriptDenylist,
  ScriptEnvelope,
  CompiledDenylistEntry,
} from './scriptSafety.js';
export * from './errors.js';
