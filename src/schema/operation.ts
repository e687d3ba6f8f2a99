import { z } from 'zod';

import { jsonValueSchema } from './parameter.js';
import type { JsonValue } from './parameter.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';

// ── Operation type discriminator ──────────────────────────────

export const operationTypeSchema = z.enum([
  'navigate',
  'click',
  'type',
  'scroll',
  'extract_html',
  'fetch',
  'download',
  'evaluate_script',
]);

export type OperationType = z.infer<typeof operationTypeSchema>;

// ── Shared pieces ─────────────────────────────────────────────

export const httpMethodSchema = z.enum([
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'HEAD',
  'OPTIONS',
]);

export type HttpMethod = z.infer<typeof httpMethodSchema>;

export const endpointSchema = z.object({
  url: z.string().min(1),
  method: httpMethodSchema.default('GET'),
  headers: z.record(jsonValueSchema).optional(),
  body: jsonValueSchema.optional(),
});

export type Endpoint = z.infer<typeof endpointSchema>;

const storeAsSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier ([A-Za-z_][A-Za-z0-9_]*)');

const baseFields = {
  description: z.string().optional(),
};

// ── Individual operation schemas ──────────────────────────────

export const navigateOperationSchema = z.object({
  ...baseFields,
  type: z.literal('navigate'),
  url: z.string().min(1),
  waitAfterMs: z.number().int().nonnegative().optional(),
});

export const clickOperationSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  selector: z.string().min(1),
});

export const typeOperationSchema = z.object({
  ...baseFields,
  type: z.literal('type'),
  selector: z.string().min(1),
  text: z.string(),
});

export const scrollOperationSchema = z.object({
  ...baseFields,
  type: z.literal('scroll'),
  selector: z.string().min(1),
});

export const extractHtmlOperationSchema = z.object({
  ...baseFields,
  type: z.literal('extract_html'),
  selector: z.string().min(1),
  storeAs: storeAsSchema.optional(),
});

export const fetchOperationSchema = z.object({
  ...baseFields,
  type: z.literal('fetch'),
  endpoint: endpointSchema,
  storeAs: storeAsSchema.optional(),
});

export const downloadOperationSchema = z.object({
  ...baseFields,
  type: z.literal('download'),
  endpoint: endpointSchema,
  filename: z.string().min(1),
  storeAs: storeAsSchema.optional(),
});

export const evaluateScriptOperationSchema = z.object({
  ...baseFields,
  type: z.literal('evaluate_script'),
  script: z.string().min(1),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .max(LIMITS.MAX_SCRIPT_TIMEOUT_MS)
    .default(TIMEOUTS.SCRIPT_TIMEOUT),
  storeAs: storeAsSchema.optional(),
});

// ── Union schema ──────────────────────────────────────────────

export const operationSchema = z.discriminatedUnion('type', [
  navigateOperationSchema,
  clickOperationSchema,
  typeOperationSchema,
  scrollOperationSchema,
  extractHtmlOperationSchema,
  fetchOperationSchema,
  downloadOperationSchema,
  evaluateScriptOperationSchema,
]);

export type Operation = z.infer<typeof operationSchema>;

export type NavigateOperation = z.infer<typeof navigateOperationSchema>;
export type ClickOperation = z.infer<typeof clickOperationSchema>;
export type TypeOperation = z.infer<typeof typeOperationSchema>;
export type ScrollOperation = z.infer<typeof scrollOperationSchema>;
export type ExtractHtmlOperation = z.infer<typeof extractHtmlOperationSchema>;
export type FetchOperation = z.infer<typeof fetchOperationSchema>;
export type DownloadOperation = z.infer<typeof downloadOperationSchema>;
export type EvaluateScriptOperation = z.infer<typeof evaluateScriptOperationSchema>;

// ── Field contexts ────────────────────────────────────────────
// Each interpolated field is either a string context (always resolves to
// text) or a structured context (whole-value placeholders keep their type).

export type OperationField =
  | { name: string; context: 'string'; value: string }
  | { name: string; context: 'structured'; value: JsonValue };

function endpointFields(endpoint: Endpoint): OperationField[] {
  const fields: OperationField[] = [
    { name: 'endpoint.url', context: 'string', value: endpoint.url },
  ];
  if (endpoint.headers !== undefined) {
    fields.push({ name: 'endpoint.headers', context: 'structured', value: endpoint.headers });
  }
  if (endpoint.body !== undefined) {
    fields.push({ name: 'endpoint.body', context: 'structured', value: endpoint.body });
  }
  return fields;
}

/** The interpolated fields of an operation, in declaration order. */
export function operationFields(op: Operation): OperationField[] {
  switch (op.type) {
    case 'navigate':
      return [{ name: 'url', context: 'string', value: op.url }];
    case 'click':
    case 'scroll':
    case 'extract_html':
      return [{ name: 'selector', context: 'string', value: op.selector }];
    case 'type':
      return [
        { name: 'selector', context: 'string', value: op.selector },
        { name: 'text', context: 'string', value: op.text },
      ];
    case 'fetch':
      return endpointFields(op.endpoint);
    case 'download':
      return [
        ...endpointFields(op.endpoint),
        { name: 'filename', context: 'string', value: op.filename },
      ];
    case 'evaluate_script':
      return [{ name: 'script', context: 'string', value: op.script }];
  }
}

/** The key an operation writes into the produced values, if any. */
export function producedKey(op: Operation): string | undefined {
  switch (op.type) {
    case 'extract_html':
    case 'fetch':
    case 'download':
    case 'evaluate_script':
      return op.storeAs;
    default:
      return undefined;
  }
}

/** Human-readable one-liner describing an operation for logs and reports. */
export function describeOperation(op: Operation): string {
  if (op.description !== undefined) return op.description;

  switch (op.type) {
    case 'navigate':
      return `navigate to ${op.url}`;
    case 'click':
      return `click ${op.selector}`;
    case 'type':
      return `type into ${op.selector}`;
    case 'scroll':
      return `scroll to ${op.selector}`;
    case 'extract_html':
      return `extract html of ${op.selector}`;
    case 'fetch':
      return `${op.endpoint.method} ${op.endpoint.url}`;
    case 'download':
      return `download ${op.endpoint.url} as ${op.filename}`;
    case 'evaluate_script':
      return 'evaluate script';
  }
}
