import { z } from 'zod';

import { jsonValueSchema } from './parameter.js';
import { operationTypeSchema } from './operation.js';

// ── States ────────────────────────────────────────────────────

export const operationStateSchema = z.enum([
  'Pending',
  'Running',
  'Succeeded',
  'Failed',
  'Aborted',
]);

export type OperationState = z.infer<typeof operationStateSchema>;

export const routineStateSchema = z.enum(['Running', 'Completed', 'Failed']);

export type RoutineState = z.infer<typeof routineStateSchema>;

// ── Error detail ──────────────────────────────────────────────

export const errorDetailSchema = z.object({
  kind: z.string().min(1),
  message: z.string(),
  detail: z.string().optional(),
});

export type ErrorDetail = z.infer<typeof errorDetailSchema>;

// ── TraceEntry ────────────────────────────────────────────────

export const traceEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  type: operationTypeSchema,
  description: z.string(),
  status: z.enum(['Succeeded', 'Failed']),
  startedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  producedKey: z.string().optional(),
  error: errorDetailSchema.optional(),
});

export type TraceEntry = z.infer<typeof traceEntrySchema>;

// ── RunReport ─────────────────────────────────────────────────

export const runReportSchema = z.object({
  runId: z.string().min(1),
  routine: z.string().min(1),
  status: routineStateSchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  operations: z.array(operationStateSchema),
  trace: z.array(traceEntrySchema),
  producedValues: z.record(jsonValueSchema),
  error: errorDetailSchema.optional(),
});

export type RunReport = z.infer<typeof runReportSchema>;

// ── Helpers ───────────────────────────────────────────────────

export function countSucceeded(report: RunReport): number {
  return report.trace.filter((e) => e.status === 'Succeeded').length;
}
