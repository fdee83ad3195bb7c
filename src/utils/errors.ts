import * as k8s from '@kubernetes/client-node';

export type OperationErrorCode =
  | 'UnknownOperation'
  | 'UnknownContext'
  | 'ReadonlyViolation'
  | 'InvalidArguments'
  | 'ClientConstructionError'
  | 'UpstreamError';

export type UpstreamErrorKind = 'api' | 'resource' | 'timeout' | 'cancelled' | 'transport';

/** Shape every dispatch failure takes on its way back to the caller. */
export interface ErrorPayload {
  code: OperationErrorCode;
  message: string;
  operation?: string;
  context?: string;
  status?: number;
  reason?: string;
  kind?: UpstreamErrorKind;
  issues?: string[];
}

export abstract class OperationError extends Error {
  abstract readonly code: OperationErrorCode;

  toJSON(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

export class UnknownOperationError extends OperationError {
  readonly code = 'UnknownOperation';

  constructor(readonly operation: string) {
    super(`Unknown operation '${operation}'`);
    this.name = 'UnknownOperationError';
  }

  override toJSON(): ErrorPayload {
    return { ...super.toJSON(), operation: this.operation };
  }
}

export class UnknownContextError extends OperationError {
  readonly code = 'UnknownContext';

  constructor(readonly context: string) {
    super(`Unknown context '${context}'`);
    this.name = 'UnknownContextError';
  }

  override toJSON(): ErrorPayload {
    return { ...super.toJSON(), context: this.context };
  }
}

export class ReadonlyViolationError extends OperationError {
  readonly code = 'ReadonlyViolation';

  constructor(readonly operation: string) {
    super(`Operation '${operation}' is not allowed in readonly mode`);
    this.name = 'ReadonlyViolationError';
  }

  override toJSON(): ErrorPayload {
    return { ...super.toJSON(), operation: this.operation };
  }
}

export class InvalidArgumentsError extends OperationError {
  readonly code = 'InvalidArguments';

  constructor(
    readonly operation: string,
    readonly issues: string[],
  ) {
    super(`Invalid arguments for '${operation}': ${issues.join('; ')}`);
    this.name = 'InvalidArgumentsError';
  }

  override toJSON(): ErrorPayload {
    return { ...super.toJSON(), operation: this.operation, issues: this.issues };
  }
}

export class ClientConstructionError extends OperationError {
  readonly code = 'ClientConstructionError';

  constructor(
    readonly context: string,
    cause: unknown,
  ) {
    super(`Failed to connect to context '${context}': ${formatK8sError(cause)}`, { cause });
    this.name = 'ClientConstructionError';
  }

  override toJSON(): ErrorPayload {
    return { ...super.toJSON(), context: this.context };
  }
}

export interface UpstreamErrorDetails {
  operation: string;
  context: string;
  kind: UpstreamErrorKind;
  status?: number;
  reason?: string;
  cause?: unknown;
}

export class UpstreamError extends OperationError {
  readonly code = 'UpstreamError';
  readonly operation: string;
  readonly context: string;
  readonly kind: UpstreamErrorKind;
  readonly status?: number;
  readonly reason?: string;

  constructor(message: string, details: UpstreamErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'UpstreamError';
    this.operation = details.operation;
    this.context = details.context;
    this.kind = details.kind;
    this.status = details.status;
    this.reason = details.reason;
  }

  override toJSON(): ErrorPayload {
    return {
      ...super.toJSON(),
      operation: this.operation,
      context: this.context,
      kind: this.kind,
      ...(this.status !== undefined ? { status: this.status } : {}),
      ...(this.reason !== undefined ? { reason: this.reason } : {}),
    };
  }
}

/** Fatal at startup: no usable kube context could be loaded. */
export class ContextLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContextLoadError';
  }
}

/** Fatal at startup: flags or environment did not validate. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** An object the API returned lacks what the operation needs to modify it. */
export class UnexpectedResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnexpectedResourceError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation was cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

interface StatusBody {
  message?: string;
  reason?: string;
}

// ApiException bodies arrive either parsed or as the raw response text.
function readStatusBody(body: unknown): StatusBody {
  if (typeof body === 'string') {
    try {
      return readStatusBody(JSON.parse(body));
    } catch {
      return body ? { message: body } : {};
    }
  }
  if (typeof body !== 'object' || body === null) {
    return {};
  }
  const message = 'message' in body && typeof body.message === 'string' ? body.message : undefined;
  const reason = 'reason' in body && typeof body.reason === 'string' ? body.reason : undefined;
  return { message, reason };
}

export function formatK8sError(err: unknown): string {
  if (err instanceof k8s.ApiException) {
    const { message } = readStatusBody(err.body);
    if (message) {
      return `Kubernetes API error (${err.code}): ${message}`;
    }
    return `Kubernetes API error (${err.code}): ${JSON.stringify(err.body)}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function toUpstreamError(err: unknown, operation: string, context: string): UpstreamError {
  if (err instanceof UpstreamError) {
    return err;
  }
  if (err instanceof k8s.ApiException) {
    const { reason } = readStatusBody(err.body);
    return new UpstreamError(formatK8sError(err), {
      operation,
      context,
      kind: 'api',
      status: err.code,
      reason,
      cause: err,
    });
  }
  if (err instanceof UnexpectedResourceError) {
    return new UpstreamError(err.message, { operation, context, kind: 'resource', cause: err });
  }
  if (err instanceof TimeoutError) {
    return new UpstreamError(err.message, { operation, context, kind: 'timeout', cause: err });
  }
  if (err instanceof CancelledError) {
    return new UpstreamError(err.message, { operation, context, kind: 'cancelled', cause: err });
  }
  return new UpstreamError(formatK8sError(err), { operation, context, kind: 'transport', cause: err });
}
