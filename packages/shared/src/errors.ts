/**
 * Error taxonomy shared by the gateway, orchestrator and HTTP layer.
 *
 * Every failure that crosses a module boundary is a ParleyError with a stable
 * `kind` (serialized on the wire) and the HTTP status it maps to.
 */

export type ErrorKind =
  | 'ModelUnavailable'
  | 'Timeout'
  | 'ToolNotFound'
  | 'ToolExecutionFailed'
  | 'MalformedToolArguments'
  | 'RoleNotFound'
  | 'RoleProxyFailed'
  | 'RecursionLimitExceeded'
  | 'MaxRoundsExceeded'
  | 'SessionNotFound'
  | 'ValidationFailed'
  | 'Conflict'
  | 'Cancelled'
  | 'Internal';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ModelUnavailable: 503,
  Timeout: 504,
  ToolNotFound: 404,
  ToolExecutionFailed: 500,
  MalformedToolArguments: 400,
  RoleNotFound: 404,
  RoleProxyFailed: 502,
  RecursionLimitExceeded: 400,
  MaxRoundsExceeded: 500,
  SessionNotFound: 404,
  ValidationFailed: 400,
  Conflict: 409,
  Cancelled: 499,
  Internal: 500,
};

export class ParleyError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export class ModelUnavailableError extends ParleyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ModelUnavailable', message, options);
  }
}

export class TimeoutError extends ParleyError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('Timeout', `${operation} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ToolNotFoundError extends ParleyError {
  constructor(readonly toolName: string) {
    super('ToolNotFound', `Tool ${toolName} not found`);
  }
}

export class ToolExecutionError extends ParleyError {
  constructor(readonly toolName: string, cause: unknown) {
    super('ToolExecutionFailed', `Error executing ${toolName}: ${errorMessage(cause)}`, { cause });
  }
}

export class MalformedToolArgumentsError extends ParleyError {
  constructor(readonly toolName: string, detail: string) {
    super('MalformedToolArguments', `invalid arguments for ${toolName}: ${detail}`);
  }
}

export class RoleNotFoundError extends ParleyError {
  constructor(readonly roleId: string) {
    super('RoleNotFound', `Role ${roleId} not found`);
  }
}

export class RoleProxyError extends ParleyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RoleProxyFailed', message, options);
  }
}

export class RecursionLimitError extends ParleyError {
  constructor(depth: number, limit: number) {
    super('RecursionLimitExceeded', `role delegation depth ${depth} exceeds limit ${limit}`);
  }
}

export class MaxRoundsExceededError extends ParleyError {
  constructor(readonly maxRounds: number) {
    super('MaxRoundsExceeded', `tool loop exceeded ${maxRounds} rounds`);
  }
}

export class SessionNotFoundError extends ParleyError {
  constructor(readonly sessionId: string) {
    super('SessionNotFound', `Session ${sessionId} not found`);
  }
}

export class ValidationError extends ParleyError {
  constructor(message: string) {
    super('ValidationFailed', message);
  }
}

export class CancelledError extends ParleyError {
  constructor(message = 'operation cancelled') {
    super('Cancelled', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalize anything thrown into a ParleyError (unknown values become `Internal`). */
export function toParleyError(err: unknown): ParleyError {
  if (err instanceof ParleyError) return err;
  return new ParleyError('Internal', errorMessage(err), { cause: err });
}

export function isParleyError(err: unknown, kind?: ErrorKind): err is ParleyError {
  return err instanceof ParleyError && (kind === undefined || err.kind === kind);
}
