/**
 * src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across the data layer, facade and controllers.
 * - Keeps API error responses consistent (code + HTTP status).
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 */

export const APP_ERROR_CODES = [
  'FORBIDDEN',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'CONFIGURATION_ERROR',
  'UNAVAILABLE',
  'QUERY_FAILED',
  'NOT_IMPLEMENTED',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    cause?: unknown;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta });
  }

  /** Misconfiguration detected at build or call time. Never a client fault. */
  static configuration(message: string, meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFIGURATION_ERROR', status: 500, message, meta });
  }

  static unavailable(message = 'Service unavailable', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAVAILABLE', status: 503, message, meta });
  }

  static queryFailed(message = 'Query failed', meta?: AppErrorMeta, cause?: unknown) {
    return new AppError({ code: 'QUERY_FAILED', status: 502, message, meta, cause });
  }

  static notImplemented(message = 'Not implemented', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_IMPLEMENTED', status: 501, message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta });
  }
}
