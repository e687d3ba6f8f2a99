import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';

import type {
  Endpoint,
  EvaluateScriptOperation,
  Operation,
  OperationType,
} from '../schema/operation.js';
import { describeOperation, producedKey } from '../schema/operation.js';
import type { JsonValue, ParameterValues } from '../schema/parameter.js';
import { jsonValueSchema } from '../schema/parameter.js';
import type { ErrorDetail, OperationState, RunReport, TraceEntry } from '../schema/results.js';
import type { BrowserControl, HttpClient, HttpRequest, HttpResponse } from '../browser/collaborators.js';
import type { ValueScope } from '../placeholders/interpolate.js';
import {
  interpolateRecord,
  interpolateString,
  interpolateStructured,
} from '../placeholders/interpolate.js';
import { withTimeout } from '../utils/timeout.js';
import * as log from '../utils/logger.js';
import { LIMITS } from '../config/defaults.js';
import type { AcceptedRoutine } from './validator.js';
import type { ExecutionContext } from './context.js';
import { createExecutionContext } from './context.js';
import {
  CollaboratorError,
  RoutineError,
  RunCancelledError,
  ScriptValidationError,
  toErrorDetail,
} from './errors.js';
import type { ScriptDenylist } from './scriptSafety.js';
import {
  DEFAULT_DENYLIST,
  generateEvaluateWrapper,
  scriptEnvelopeSchema,
  validateScript,
} from './scriptSafety.js';

// ── Public types ─────────────────────────────────────────────

export interface ExecutorDeps {
  browser: BrowserControl;
  http: HttpClient;
  denylist?: ScriptDenylist | undefined;
  /** Suppress stderr progress output. */
  quiet?: boolean | undefined;
}

export interface RunOptions {
  /** Checked before each operation starts; an in-flight call is not interrupted. */
  signal?: AbortSignal | undefined;
}

interface Produced {
  key: string;
  value: JsonValue;
}

// ── Executor ─────────────────────────────────────────────────

/**
 * Runs an accepted routine's operations strictly in order. The first
 * failure stops the run; everything after it is marked Aborted. The
 * report always carries the trace up to that point.
 */
export class RoutineExecutor {
  private readonly browser: BrowserControl;
  private readonly http: HttpClient;
  private readonly denylist: ScriptDenylist;
  private readonly quiet: boolean;

  constructor(deps: ExecutorDeps) {
    this.browser = deps.browser;
    this.http = deps.http;
    this.denylist = deps.denylist ?? DEFAULT_DENYLIST;
    this.quiet = deps.quiet ?? false;
  }

  async run(
    accepted: AcceptedRoutine,
    values: ParameterValues = {},
    options: RunOptions = {},
  ): Promise<RunReport> {
    const runId = randomUUID();
    const startedAt = new Date();
    const operations = accepted.routine.operations;
    const states: OperationState[] = operations.map(() => 'Pending');

    let context: ExecutionContext;
    try {
      context = createExecutionContext(accepted, values);
    } catch (err) {
      abortFrom(states, 0);
      const failure = toErrorDetail(err);
      this.say(() => log.error(failure.message));
      return buildReport(runId, accepted, startedAt, states, [], {}, failure);
    }

    for (const name of context.ignoredNames) {
      this.say(() => log.warn(`Ignoring value for undeclared parameter "${name}"`));
    }

    this.say(() => log.section(`Routine: ${accepted.name}`));

    let failure: ErrorDetail | undefined;

    for (const [index, op] of operations.entries()) {
      if (options.signal?.aborted === true) {
        abortFrom(states, index);
        failure = new RunCancelledError().toDetail();
        this.say(() => log.warn(failure?.message ?? 'Run cancelled'));
        break;
      }

      const description = describeOperation(op);
      const started = new Date();
      states[index] = 'Running';
      this.say(() => log.operation(index, operations.length, description));

      try {
        const produced = await this.execute(op, context);
        if (produced !== undefined) {
          context.recordProduced(produced.key, produced.value);
          this.say(() => log.produced(produced.key));
        }

        states[index] = 'Succeeded';
        context.appendTrace(
          traceEntry(index, op, description, started, 'Succeeded', produced?.key),
        );
        this.say(() => log.operationResult(index, operations.length, true, description));
      } catch (err) {
        failure = toErrorDetail(err);
        states[index] = 'Failed';
        context.appendTrace(
          traceEntry(index, op, description, started, 'Failed', undefined, failure),
        );
        abortFrom(states, index + 1);

        const message = failure.message;
        this.say(() => log.operationResult(index, operations.length, false, description));
        this.say(() => log.error(message));
        break;
      }
    }

    return buildReport(
      runId,
      accepted,
      startedAt,
      states,
      context.trace,
      context.producedSnapshot(),
      failure,
    );
  }

  // ── Dispatch ───────────────────────────────────────────────

  private async execute(op: Operation, scope: ValueScope): Promise<Produced | undefined> {
    switch (op.type) {
      case 'navigate': {
        const url = interpolateString(op.url, scope);
        await this.call(op.type, () => this.browser.navigate(url));
        if (op.waitAfterMs !== undefined && op.waitAfterMs > 0) {
          await sleep(op.waitAfterMs);
        }
        return undefined;
      }

      case 'click': {
        const selector = interpolateString(op.selector, scope);
        await this.call(op.type, () => this.browser.click(selector));
        return undefined;
      }

      case 'type': {
        const selector = interpolateString(op.selector, scope);
        const text = interpolateString(op.text, scope);
        await this.call(op.type, () => this.browser.type(selector, text));
        return undefined;
      }

      case 'scroll': {
        const selector = interpolateString(op.selector, scope);
        await this.call(op.type, () => this.browser.scroll(selector));
        return undefined;
      }

      case 'extract_html': {
        const selector = interpolateString(op.selector, scope);
        const html = await this.call(op.type, () => this.browser.extractHtml(selector));
        return store(op, html);
      }

      case 'fetch': {
        const request = resolveRequest(op.endpoint, scope);
        const response = await this.call(op.type, () => this.http.send(request));
        return store(op, decodeResponseBody(response));
      }

      case 'download': {
        const request = resolveRequest(op.endpoint, scope);
        const filename = interpolateString(op.filename, scope);
        const saved = await this.call(op.type, () => this.http.download(request, filename));
        return store(op, saved);
      }

      case 'evaluate_script':
        return this.evaluate(op, scope);
    }
  }

  private async evaluate(
    op: EvaluateScriptOperation,
    scope: ValueScope,
  ): Promise<Produced | undefined> {
    const source = interpolateString(op.script, scope);

    const check = validateScript(source, this.denylist);
    if (check.errors.length > 0) {
      throw new ScriptValidationError(check.errors);
    }
    for (const warning of check.warnings) {
      this.say(() => log.warn(`Script: ${warning}`));
    }

    const wrapped = generateEvaluateWrapper(source, op.storeAs);
    const raw = await this.call(op.type, () =>
      withTimeout(
        this.browser.evaluateScript(wrapped, op.timeoutMs),
        op.timeoutMs,
        'Script evaluation',
      ),
    );

    const envelope = scriptEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new CollaboratorError(op.type, 'Script returned an unexpected result envelope');
    }
    for (const line of envelope.data.console_logs) {
      this.say(() => log.detail(`console: ${line.message}`));
    }
    if (envelope.data.execution_error !== null) {
      throw new CollaboratorError(op.type, `Script threw: ${envelope.data.execution_error}`);
    }
    if (envelope.data.storage_error !== null) {
      throw new CollaboratorError(op.type, envelope.data.storage_error);
    }

    const key = op.storeAs;
    if (key === undefined) return undefined;

    // The page's own JSON.stringify output is the value of record, not the
    // envelope's `result`; the wrapper clears the key, so null means nothing was stored.
    const stored = await this.call(op.type, () => this.browser.readSessionStorage(key));
    if (stored === null) return undefined;
    return { key, value: parseStoredValue(stored) };
  }

  /** Run a collaborator call, normalizing anything it throws into a CollaboratorError. */
  private async call<T>(operation: OperationType, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof RoutineError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new CollaboratorError(operation, message, err);
    }
  }

  private say(write: () => void): void {
    if (!this.quiet) write();
  }
}

// ── Helpers ──────────────────────────────────────────────────

function resolveRequest(endpoint: Endpoint, scope: ValueScope): HttpRequest {
  return {
    method: endpoint.method,
    url: interpolateString(endpoint.url, scope),
    headers: endpoint.headers !== undefined ? interpolateRecord(endpoint.headers, scope) : {},
    ...(endpoint.body !== undefined ? { body: interpolateStructured(endpoint.body, scope) } : {}),
  };
}

function store(op: Operation, value: JsonValue): Produced | undefined {
  const key = producedKey(op);
  return key !== undefined ? { key, value } : undefined;
}

/** JSON responses are stored parsed; anything else as text. */
export function decodeResponseBody(response: HttpResponse): JsonValue {
  const contentType = Object.entries(response.headers).find(
    ([name]) => name.toLowerCase() === 'content-type',
  )?.[1];
  if (contentType === undefined || !contentType.includes('json')) {
    return response.body;
  }
  return parseStoredValue(response.body);
}

function parseStoredValue(text: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  const result = jsonValueSchema.safeParse(parsed);
  return result.success ? result.data : text;
}

function abortFrom(states: OperationState[], start: number): void {
  for (let i = start; i < states.length; i++) {
    states[i] = 'Aborted';
  }
}

function traceEntry(
  index: number,
  op: Operation,
  description: string,
  started: Date,
  status: TraceEntry['status'],
  key?: string,
  error?: ErrorDetail,
): TraceEntry {
  return {
    index,
    type: op.type,
    description,
    status,
    startedAt: started.toISOString(),
    durationMs: Date.now() - started.getTime(),
    ...(key !== undefined ? { producedKey: key } : {}),
    ...(error !== undefined ? { error: truncateDetail(error) } : {}),
  };
}

function truncateDetail(error: ErrorDetail): ErrorDetail {
  if (error.detail === undefined || error.detail.length <= LIMITS.MAX_TRACE_DETAIL_CHARS) {
    return error;
  }
  return { ...error, detail: error.detail.slice(0, LIMITS.MAX_TRACE_DETAIL_CHARS) };
}

function buildReport(
  runId: string,
  accepted: AcceptedRoutine,
  startedAt: Date,
  states: readonly OperationState[],
  trace: readonly TraceEntry[],
  producedValues: Record<string, JsonValue>,
  failure: ErrorDetail | undefined,
): RunReport {
  const finishedAt = new Date();
  return {
    runId,
    routine: accepted.name,
    status: failure === undefined ? 'Completed' : 'Failed',
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    operations: [...states],
    trace: [...trace],
    producedValues,
    ...(failure !== undefined ? { error: failure } : {}),
  };
}
