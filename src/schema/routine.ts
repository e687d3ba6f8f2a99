import { z } from 'zod';

import { parameterSchema } from './parameter.js';
import { operationSchema } from './operation.js';

// ── Routine ───────────────────────────────────────────────────

export const routineSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  parameters: z.array(parameterSchema).default([]),
  operations: z.array(operationSchema).min(1),
});

export type Routine = z.infer<typeof routineSchema>;

// ── Parsers ───────────────────────────────────────────────────

export function parseRoutine(data: unknown): Routine {
  return routineSchema.parse(data);
}
