export type ErrorCode =
  | 'Unauthenticated'
  | 'MalformedToken'
  | 'Forbidden'
  | 'NoEligibleRole'
  | 'InvalidPublicKey'
  | 'InvalidRequest'
  | 'NotFound'
  | 'Conflict'
  | 'RateLimited'
  | 'UpstreamUnavailable'
  | 'AuditWriteFailed'
  | 'Internal';

const HTTP_STATUS: Record<ErrorCode, number> = {
  Unauthenticated: 401,
  MalformedToken: 401,
  Forbidden: 403,
  NoEligibleRole: 403,
  InvalidPublicKey: 400,
  InvalidRequest: 400,
  NotFound: 404,
  Conflict: 409,
  RateLimited: 429,
  UpstreamUnavailable: 503,
  AuditWriteFailed: 500,
  Internal: 500,
};

export interface AppErrorOptions {
  details?: Record<string, unknown>;
  retryAfterSeconds?: number;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;
  readonly retryAfterSeconds?: number;

  constructor(code: ErrorCode, message: string, opts: AppErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = code;
    this.status = HTTP_STATUS[code];
    this.details = opts.details;
    this.retryAfterSeconds = opts.retryAfterSeconds ?? (code === 'UpstreamUnavailable' ? 5 : undefined);
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function hasCode(err: unknown, code: ErrorCode): boolean {
  return isAppError(err) && err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ErrorBody {
  error: string;
  code: ErrorCode;
  requestId?: string;
  details?: Record<string, unknown>;
}

export function toErrorBody(err: AppError, requestId?: string): ErrorBody {
  const body: ErrorBody = { error: err.message, code: err.code };
  if (requestId) body.requestId = requestId;
  if (err.details) body.details = err.details;
  return body;
}
