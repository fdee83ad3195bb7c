import type { ClientProvider } from './client-cache.js';
import type { ContextDescriptor, ContextResolver } from './context-registry.js';
import type { OperationDescriptor, OperationTable } from './operations.js';
import type { PolicyGate } from './policy.js';
import { withTimeout } from './utils/async.js';
import {
  InvalidArgumentsError,
  OperationError,
  UnknownOperationError,
  toUpstreamError,
  type ErrorPayload,
} from './utils/errors.js';
import type { Logger } from './utils/logger.js';

export const DEFAULT_NAMESPACE = 'default';

export type DispatchResult =
  | { ok: true; operation: string; context: string; data: unknown }
  | { ok: false; error: ErrorPayload };

export interface DispatchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface DispatcherDeps<TClient> {
  operations: OperationTable<TClient>;
  contexts: ContextResolver;
  policy: PolicyGate;
  clients: ClientProvider<TClient>;
  timeoutMs: number;
  logger: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON-safe copy of a handler result: dates become ISO strings, undefined becomes null. */
export function normalizeResult(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  return JSON.parse(JSON.stringify(value));
}

export class Dispatcher<TClient> {
  constructor(private readonly deps: DispatcherDeps<TClient>) {}

  /**
   * Runs one operation: lookup, context resolution, policy check, argument
   * validation, client acquisition, handler call. Failures come back as
   * values; nothing is thrown and nothing is retried.
   */
  async dispatch(
    operationName: string,
    contextName: string | undefined,
    args: unknown,
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const started = Date.now();
    const log = this.deps.logger.child({ operation: operationName, context: contextName });
    try {
      const { context, data } = await this.execute(operationName, contextName, args, options);
      log.debug({ resolvedContext: context.name, durationMs: Date.now() - started }, 'operation succeeded');
      return { ok: true, operation: operationName, context: context.name, data: normalizeResult(data) };
    } catch (err) {
      const error =
        err instanceof OperationError
          ? err
          : toUpstreamError(err, operationName, contextName ?? '');
      log.warn({ code: error.code, err: error.message, durationMs: Date.now() - started }, 'operation failed');
      return { ok: false, error: error.toJSON() };
    }
  }

  private async execute(
    operationName: string,
    contextName: string | undefined,
    args: unknown,
    options: DispatchOptions,
  ): Promise<{ context: ContextDescriptor; data: unknown }> {
    const { operations, contexts, policy, clients } = this.deps;

    const operation = operations.get(operationName);
    if (!operation) {
      throw new UnknownOperationError(operationName);
    }

    const context = contexts.resolve(contextName);

    const authorization = policy.authorize(operation);
    if (!authorization.allowed) {
      throw authorization.error;
    }

    const input = this.prepareArguments(operation, context, args);

    const client = await clients.get(context);

    const timeoutMs = options.timeoutMs ?? this.deps.timeoutMs;
    try {
      const data = await withTimeout(
        (signal) => operation.handler(client, input, { context, signal }),
        timeoutMs,
        options.signal,
      );
      return { context, data };
    } catch (err) {
      throw toUpstreamError(err, operation.name, context.name);
    }
  }

  private prepareArguments(
    operation: OperationDescriptor<TClient>,
    context: ContextDescriptor,
    args: unknown,
  ): unknown {
    const raw = args ?? {};
    if (!isRecord(raw)) {
      throw new InvalidArgumentsError(operation.name, ['arguments must be an object']);
    }

    const withNamespace =
      operation.scope === 'namespaced' && raw.namespace === undefined
        ? { ...raw, namespace: context.namespace ?? DEFAULT_NAMESPACE }
        : raw;

    const parsed = operation.input.safeParse(withNamespace);
    if (!parsed.success) {
      throw new InvalidArgumentsError(
        operation.name,
        parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      );
    }
    return parsed.data;
  }
}
