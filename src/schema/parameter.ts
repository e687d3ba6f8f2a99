import { z } from 'zod';

// ── JSON values ───────────────────────────────────────────────

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

// ── Parameter type ────────────────────────────────────────────

export const parameterTypeSchema = z.enum([
  'string',
  'integer',
  'number',
  'boolean',
  'date',
]);

export type ParameterType = z.infer<typeof parameterTypeSchema>;

// ── Parameter value (what a caller supplies) ──────────────────

export const parameterValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
]);

export type ParameterValue = z.infer<typeof parameterValueSchema>;

export const parameterValuesSchema = z.record(parameterValueSchema);

export type ParameterValues = z.infer<typeof parameterValuesSchema>;

// ── Parameter ─────────────────────────────────────────────────

export const PARAMETER_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const parameterSchema = z.object({
  name: z
    .string()
    .regex(PARAMETER_NAME_PATTERN, 'must be an identifier ([A-Za-z_][A-Za-z0-9_]*)'),
  type: parameterTypeSchema,
  description: z.string().optional(),
  examples: z.array(z.string()).default([]),
  required: z.boolean().default(true),
  default: parameterValueSchema.optional(),
});

export type Parameter = z.infer<typeof parameterSchema>;

// ── Type map ──────────────────────────────────────────────────

export type ParameterTypeMap = ReadonlyMap<string, ParameterType>;

export function buildTypeMap(parameters: readonly Parameter[]): ParameterTypeMap {
  return new Map(parameters.map((p) => [p.name, p.type]));
}
