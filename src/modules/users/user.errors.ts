/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, stored hashes or query parameters in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  /** No data source configured or reachable. Strict mode only. */
  storeUnavailable(meta?: AppErrorMeta) {
    return AppError.unavailable('User store is unavailable.', meta);
  },

  /** Driver-level failure (syntax, binding, execution). Strict mode only. */
  queryFailed(meta?: AppErrorMeta, cause?: unknown) {
    return AppError.queryFailed('User store query failed.', meta, cause);
  },

  /** Credential rotation is not a function of this store. */
  credentialUpdateUnsupported(meta?: AppErrorMeta) {
    return AppError.notImplemented('Password update not supported.', meta);
  },

  invalidUserId(meta?: AppErrorMeta) {
    return AppError.validationError('User id must be an integer.', meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  removalNotAllowed(meta?: AppErrorMeta) {
    return AppError.forbidden('Removing users is not allowed for this store.', meta);
  },
} as const;
