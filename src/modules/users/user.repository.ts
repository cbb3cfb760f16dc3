/**
 * src/modules/users/user.repository.ts
 *
 * WHY:
 * - The public read/query/validate surface the identity host consumes.
 * - Composes the DAL statements, the query executor and the credential validator.
 *
 * RULES:
 * - Read-only. Never creates, updates or deletes users.
 * - Failed/unavailable outcomes follow QueryErrorMode (see settle()).
 * - Never log passwords or stored credentials.
 */

import type { QueryOutcome } from '../../shared/db/query-executor';
import type { Logger } from '../../shared/logger/logger';
import type { CredentialValidator } from './credentials/credential-validator';
import {
  selectAllUsersSql,
  selectPasswordHashSql,
  selectSearchCountSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUserByUsernameSql,
  selectUserCountSql,
  selectUsersBySearchSql,
} from './dal/user.query-sql';
import type { UserSqlContext } from './dal/user.query-sql';
import { UserErrors } from './user.errors';
import type { Pageable, QueryErrorMode, UserRecord } from './user.types';

function parseUserId(id: number | string): number {
  const value = typeof id === 'number' ? id : /^\s*-?\d+\s*$/.test(id) ? Number(id) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw UserErrors.invalidUserId({ id: String(id) });
  }
  return value;
}

function hasSearch(search: string | null | undefined): search is string {
  return typeof search === 'string' && search.length > 0;
}

export class UserRepository {
  private readonly sql: UserSqlContext;

  constructor(
    private readonly deps: UserSqlContext & {
      credentials: CredentialValidator;
      errorMode: QueryErrorMode;
      logger: Logger;
    },
  ) {
    this.sql = { executor: deps.executor, queries: deps.queries };
  }

  async getAllUsers(): Promise<UserRecord[]> {
    return this.settle('getAllUsers', await selectAllUsersSql(this.sql), []);
  }

  async getUsersCount(search?: string | null): Promise<number> {
    const outcome = hasSearch(search)
      ? await selectSearchCountSql(this.sql, search)
      : await selectUserCountSql(this.sql);

    return this.settle('getUsersCount', outcome, undefined) ?? 0;
  }

  async findUserById(id: number | string): Promise<UserRecord | undefined> {
    const rows = this.settle('findUserById', await selectUserByIdSql(this.sql, parseUserId(id)), []);
    return rows[0];
  }

  async findUserByUsername(username: string): Promise<UserRecord | undefined> {
    const rows = this.settle(
      'findUserByUsername',
      await selectUserByUsernameSql(this.sql, username),
      [],
    );
    return rows[0];
  }

  async findUserByEmail(email: string): Promise<UserRecord | undefined> {
    const rows = this.settle('findUserByEmail', await selectUserByEmailSql(this.sql, email), []);
    return rows[0];
  }

  async findUsers(search?: string | null, pageable?: Pageable): Promise<UserRecord[]> {
    const outcome = hasSearch(search)
      ? await selectUsersBySearchSql(this.sql, search, pageable)
      : await selectAllUsersSql(this.sql, pageable);

    return this.settle('findUsers', outcome, []);
  }

  async validateCredentials(username: string, password: string): Promise<boolean> {
    const stored = this.settle(
      'validateCredentials',
      await selectPasswordHashSql(this.sql, username),
      undefined,
    );

    const valid = await this.deps.credentials.matches(password, stored);

    this.deps.logger.debug('credentials.validated', {
      flow: 'credentials.validate',
      scheme: this.deps.credentials.scheme.kind,
      found: stored !== undefined,
      valid,
    });

    return valid;
  }

  async updateCredentials(username: string, _password: string): Promise<boolean> {
    throw UserErrors.credentialUpdateUnsupported({ username });
  }

  /** Capability flag only: deletion itself is the host's decision. */
  removeUser(): boolean {
    return this.deps.queries.allowDelete;
  }

  private settle<T>(operation: string, outcome: QueryOutcome<T>, fallback: T): T {
    switch (outcome.status) {
      case 'ok':
        return outcome.value;

      case 'unavailable':
        if (this.deps.errorMode === 'strict') throw UserErrors.storeUnavailable({ operation });
        this.deps.logger.warn('users.store_unavailable', { flow: 'users', operation });
        return fallback;

      case 'failed':
        if (this.deps.errorMode === 'strict') {
          throw UserErrors.queryFailed({ operation }, outcome.error);
        }
        this.deps.logger.warn('users.query_failed_as_empty', { flow: 'users', operation });
        return fallback;
    }
  }
}
