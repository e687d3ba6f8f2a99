/**
 * CLI module, a thin layer over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerValidateCommand,
  registerRunCommand,
  collectParam,
  loadParameterValues,
  EXIT_CODES,
} from './run.js';
