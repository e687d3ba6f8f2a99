import { z } from 'zod';

import { errorDetailSchema, operationStateSchema, routineStateSchema } from './results.js';
import { jsonValueSchema } from './parameter.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Operation output ────────────────────────────────────────

export const jsonOutputOperationSchema = z.object({
  index: z.number().int().nonnegative(),
  type: z.string().min(1),
  description: z.string(),
  state: operationStateSchema,
  durationMs: z.number().int().nonnegative().optional(),
  producedKey: z.string().optional(),
  error: errorDetailSchema.optional(),
});

export type JsonOutputOperation = z.infer<typeof jsonOutputOperationSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  routine: z.string().min(1),
  status: routineStateSchema,
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  operations: z.array(jsonOutputOperationSchema),
  producedValues: z.record(jsonValueSchema),
  error: errorDetailSchema.optional(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
