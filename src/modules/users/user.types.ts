/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Types for the Users module: an external, read-only user store.
 * - Users are whatever the configured queries project; we never fix a column set.
 *
 * RULES:
 * - QueryConfiguration is frozen after construction and passed by reference.
 */

import type { Dialect } from '../../shared/db/pagination';
import type { UserRecord } from '../../shared/db/row-transformers';

export type { UserRecord };
export type { Pageable } from '../../shared/db/pagination';

export type QueryTemplates = {
  listAll: string;
  count: string;
  findById: string;
  findByUsername: string;
  findByEmail: string;
  findBySearchTerm: string;
  findPasswordHash: string;
};

export type QueryConfiguration = Readonly<
  QueryTemplates & {
    dialect: Dialect;
    /** Digest name in legacy notation, or "PBKDF2-SHA256". Ignored when adaptiveHash is set. */
    hashFunction: string;
    /** Stored credentials are bcrypt strings. */
    adaptiveHash: boolean;
    /** Host may unlink/remove users it federated from this store. */
    allowDelete: boolean;
  }
>;

/**
 * lenient: failed/unavailable queries read as "no result" (legacy host contract).
 * strict: they raise QUERY_FAILED / UNAVAILABLE.
 */
export type QueryErrorMode = 'lenient' | 'strict';
