/**
 * Report generation module.
 * Deterministic. Transforms a run report into markdown + JSON artifacts.
 */

export {
  generateMarkdown,
  generateJSON,
  serializeJSON,
  formatValidationReport,
} from './reporter.js';
