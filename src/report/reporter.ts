import type { Operation } from '../schema/operation.js';
import { describeOperation } from '../schema/operation.js';
import type { OperationState, RoutineState, RunReport, TraceEntry } from '../schema/results.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputOperation } from '../schema/jsonOutput.js';
import type { ValidationReport } from '../core/validator.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputOperation };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  report: RunReport,
  operations: readonly Operation[],
  exitCode: number,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: report.runId,
    routine: report.routine,
    status: report.status,
    durationMs: report.durationMs,
    exitCode,
    operations: operations.map((op, index) => operationToJSON(report, op, index)),
    producedValues: report.producedValues,
    ...(report.error !== undefined ? { error: report.error } : {}),
  };
}

function operationToJSON(report: RunReport, op: Operation, index: number): JsonOutputOperation {
  const entry = traceFor(report, index);
  return {
    index,
    type: op.type,
    description: entry?.description ?? describeOperation(op),
    state: stateAt(report, index),
    ...(entry !== undefined ? { durationMs: entry.durationMs } : {}),
    ...(entry?.producedKey !== undefined ? { producedKey: entry.producedKey } : {}),
    ...(entry?.error !== undefined ? { error: entry.error } : {}),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: RunReport, operations: readonly Operation[]): string {
  const lines: string[] = [];

  lines.push(`# Routine Report: ${report.routine}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Run ID** | \`${report.runId}\` |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(report.durationMs)} |`);
  lines.push(`| **Result** | **${report.status}** ${statusIcon(report.status)} |`);
  lines.push('');

  lines.push(`## Operations`);
  lines.push('');
  lines.push(`| # | Type | Description | State | Duration |`);
  lines.push(`|---|------|-------------|-------|----------|`);

  operations.forEach((op, index) => {
    const entry = traceFor(report, index);
    const state = stateAt(report, index);
    const duration = entry !== undefined ? formatDuration(entry.durationMs) : '-';
    lines.push(
      `| ${String(index + 1)} | ${op.type} | ${escapeMarkdownCell(describeOperation(op))} | ${state} ${stateIcon(state)} | ${duration} |`,
    );
  });
  lines.push('');

  if (report.error !== undefined) {
    lines.push(`## Failure`);
    lines.push('');
    lines.push(`**${report.error.kind}:** ${report.error.message}`);
    lines.push('');
    if (report.error.detail !== undefined) {
      lines.push('```');
      lines.push(report.error.detail);
      lines.push('```');
      lines.push('');
    }
  }

  const produced = Object.entries(report.producedValues);
  if (produced.length > 0) {
    lines.push(`## Produced Values`);
    lines.push('');
    for (const [key, value] of produced) {
      lines.push(`- \`${key}\`: ${escapeMarkdownCell(preview(JSON.stringify(value)))}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── Validation report ────────────────────────────────────────

export function formatValidationReport(routineName: string, report: ValidationReport): string {
  if (report.valid) {
    return `Routine "${routineName}" is valid`;
  }
  const lines = [`Routine "${routineName}" has ${String(report.issues.length)} issue(s):`];
  for (const issue of report.issues) {
    lines.push(`  [${issue.code}] ${issue.message}`);
  }
  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function traceFor(report: RunReport, index: number): TraceEntry | undefined {
  return report.trace.find((e) => e.index === index);
}

function stateAt(report: RunReport, index: number): OperationState {
  return report.operations[index] ?? 'Pending';
}

function statusIcon(status: RoutineState): string {
  switch (status) {
    case 'Completed':
      return '[OK]';
    case 'Failed':
      return '[FAIL]';
    case 'Running':
      return '[..]';
  }
}

function stateIcon(state: OperationState): string {
  switch (state) {
    case 'Succeeded':
      return '[OK]';
    case 'Failed':
      return '[FAIL]';
    case 'Aborted':
      return '[SKIP]';
    case 'Running':
    case 'Pending':
      return '[..]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function preview(text: string, max = 120): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
