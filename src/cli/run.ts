import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { ZodError } from 'zod';

import type { FileConfig } from '../schema/config.js';
import type { ParameterValues } from '../schema/parameter.js';
import { parameterValuesSchema } from '../schema/parameter.js';
import type { RunReport } from '../schema/results.js';
import { countSucceeded } from '../schema/results.js';
import { routineSchema } from '../schema/routine.js';
import { parseDocument, resolveConfig } from '../config/loader.js';
import { createBuiltinRegistry } from '../placeholders/grammar.js';
import { AcceptedRoutine, validateRoutine } from '../core/validator.js';
import { RoutineValidationError } from '../core/errors.js';
import { RoutineExecutor } from '../core/executor.js';
import { compileDenylist } from '../core/scriptSafety.js';
import { SCRIPT_DENYLIST } from '../config/defaults.js';
import { launchSession } from '../browser/runner.js';
import type { RoutineSession } from '../browser/runner.js';
import {
  formatValidationReport,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  COMPLETED: 0,
  RUN_FAILED: 1,
  INVALID_ROUTINE: 2,
  CONFIG_ERROR: 4,
} as const;

// ── Input loading ────────────────────────────────────────────

async function readDocument(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  return parseDocument(filePath, raw);
}

/** Collect repeated `--param key=value` flags. Later flags win. */
export function collectParam(
  assignment: string,
  previous: Record<string, string>,
): Record<string, string> {
  const eqIndex = assignment.indexOf('=');
  if (eqIndex <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${assignment}".`);
  }
  const key = assignment.slice(0, eqIndex).trim();
  return { ...previous, [key]: assignment.slice(eqIndex + 1) };
}

/** Values file first, then `--param` flags on top. */
export async function loadParameterValues(
  paramsFile: string | undefined,
  assignments: Record<string, string>,
): Promise<ParameterValues> {
  const fromFile =
    paramsFile !== undefined ? parameterValuesSchema.parse(await readDocument(paramsFile)) : {};
  return { ...fromFile, ...assignments };
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(report: RunReport): void {
  process.stderr.write(`\n--- Routine Result ---\n`);
  process.stderr.write(`Routine: ${report.routine}\n`);
  process.stderr.write(`Result:  ${report.status}\n`);
  process.stderr.write(
    `Steps:   ${String(countSucceeded(report))}/${String(report.operations.length)} succeeded\n`,
  );
  if (report.error !== undefined) {
    process.stderr.write(`Error:   ${report.error.message}\n`);
  }
  process.stderr.write(`Time:    ${(report.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Run ID:  ${report.runId}\n\n`);
}

// ── Validate command ─────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a routine file for placeholder and parameter coverage')
    .argument('<routine>', 'Path to a routine file (.json, .yaml)')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output the issues as JSON to stdout')
    .action(async (routinePath: string, opts: { config?: string; json?: true }) => {
      let config: FileConfig;
      let document: unknown;
      try {
        config = await resolveConfig(opts.config);
        document = await readDocument(routinePath);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Config error: ${message}\n`);
        process.exitCode = EXIT_CODES.CONFIG_ERROR;
        return;
      }

      const parsed = routineSchema.safeParse(document);
      if (!parsed.success) {
        process.stderr.write(`Invalid routine file:\n${describeZodError(parsed.error)}\n`);
        process.exitCode = EXIT_CODES.INVALID_ROUTINE;
        return;
      }

      const report = validateRoutine(parsed.data, createBuiltinRegistry(config.builtins));

      if (opts.json) {
        const output = {
          routine: parsed.data.name,
          valid: report.valid,
          issues: report.issues.map((issue) => ({
            code: issue.code,
            message: issue.message,
            location: issue.location,
          })),
        };
        process.stdout.write(JSON.stringify(output, null, 2) + '\n');
      }

      process.stderr.write(formatValidationReport(parsed.data.name, report) + '\n');
      process.exitCode = report.valid ? EXIT_CODES.COMPLETED : EXIT_CODES.INVALID_ROUTINE;
    });
}

// ── Run command ──────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Validate and execute a routine in a Playwright browser')
    .argument('<routine>', 'Path to a routine file (.json, .yaml)')
    .option('--param <key=value>', 'Parameter value (repeatable)', collectParam, {})
    .option('--params <path>', 'JSON or YAML file of parameter values')
    .option('--config <path>', 'Path to config file')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory')
    .option('--download-dir <dir>', 'Directory for downloaded files')
    .option('--headless', 'Run browser headless')
    .option('--quiet', 'Suppress per-operation progress output')
    .action(
      async (
        routinePath: string,
        opts: {
          param: Record<string, string>;
          params?: string;
          config?: string;
          json?: true;
          reportPath?: string;
          downloadDir?: string;
          headless?: true;
          quiet?: true;
        },
      ) => {
        // 1. Config, routine document and parameter values
        let config: FileConfig;
        let document: unknown;
        let values: ParameterValues;
        try {
          config = await resolveConfig(opts.config);
          document = await readDocument(routinePath);
          values = await loadParameterValues(opts.params, opts.param);
        } catch (err) {
          const message =
            err instanceof ZodError ? describeZodError(err) : err instanceof Error ? err.message : String(err);
          process.stderr.write(`Config error: ${message}\n`);
          process.exitCode = EXIT_CODES.CONFIG_ERROR;
          return;
        }

        // 2. Acceptance: parse + coverage validation
        let accepted: AcceptedRoutine;
        try {
          accepted = AcceptedRoutine.accept(document, createBuiltinRegistry(config.builtins));
        } catch (err) {
          if (err instanceof RoutineValidationError) {
            for (const issue of err.issues) log.issue(issue.message);
          } else if (err instanceof ZodError) {
            process.stderr.write(`Invalid routine file:\n${describeZodError(err)}\n`);
          } else {
            throw err;
          }
          process.exitCode = EXIT_CODES.INVALID_ROUTINE;
          return;
        }

        // 3. Execute
        const downloadDir = opts.downloadDir ?? config.downloadDir;
        let session: RoutineSession;
        try {
          session = await launchSession({
            headless: opts.headless ?? config.headless,
            downloadDir,
            navigationTimeoutMs: config.navigationTimeoutMs,
            actionTimeoutMs: config.actionTimeoutMs,
          });
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Browser launch failed: ${message}\n`);
          process.exitCode = EXIT_CODES.CONFIG_ERROR;
          return;
        }

        const controller = new AbortController();
        const onInterrupt = (): void => {
          log.warn('Interrupt received, stopping after the current operation');
          controller.abort();
        };
        process.once('SIGINT', onInterrupt);

        let report: RunReport;
        try {
          const executor = new RoutineExecutor({
            browser: session.browser,
            http: session.http,
            denylist: compileDenylist(SCRIPT_DENYLIST, config.scriptDenylist ?? []),
            quiet: opts.quiet ?? false,
          });
          report = await executor.run(accepted, values, { signal: controller.signal });
        } finally {
          process.off('SIGINT', onInterrupt);
          await session.close();
        }

        // 4. Artifacts
        const exitCode =
          report.status === 'Completed' ? EXIT_CODES.COMPLETED : EXIT_CODES.RUN_FAILED;
        const outputDir = path.resolve(opts.reportPath ?? config.reportPath, report.runId);
        const json = generateJSON(report, accepted.routine.operations, exitCode);

        await mkdir(outputDir, { recursive: true });
        await writeFile(
          path.join(outputDir, 'report.md'),
          generateMarkdown(report, accepted.routine.operations),
          'utf-8',
        );
        await writeFile(path.join(outputDir, 'report.json'), serializeJSON(json) + '\n', 'utf-8');
        if (!opts.quiet) log.info(`Reports written to ${outputDir}`);

        if (opts.json) {
          process.stdout.write(serializeJSON(json) + '\n');
        }

        printSummary(report);
        process.exitCode = exitCode;
      },
    );
}
