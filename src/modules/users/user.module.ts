/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring: executor -> credential validator -> repository -> routes.
 *
 * RULES:
 * - No infra creation here (DI passes the data source provider in).
 * - No globals/singletons here.
 * - The hash scheme is resolved here, once, so a bad HASH_FUNCTION fails at startup.
 */

import type { FastifyInstance } from 'fastify';

import type { DataSourceProvider } from '../../shared/db/data-source';
import { QueryExecutor } from '../../shared/db/query-executor';
import type { Logger } from '../../shared/logger/logger';
import { CredentialValidator } from './credentials/credential-validator';
import { resolveHashScheme } from './credentials/hash-scheme';
import { UserController } from './user.controller';
import { UserRepository } from './user.repository';
import { registerUserRoutes } from './user.routes';
import type { QueryConfiguration, QueryErrorMode } from './user.types';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  dataSources: DataSourceProvider;
  queries: QueryConfiguration;
  errorMode: QueryErrorMode;
  logger: Logger;
}) {
  const executor = new QueryExecutor({
    dataSources: deps.dataSources,
    dialect: deps.queries.dialect,
    logger: deps.logger,
  });

  const credentials = new CredentialValidator(resolveHashScheme(deps.queries), {
    logger: deps.logger,
  });

  const userRepository = new UserRepository({
    executor,
    queries: deps.queries,
    credentials,
    errorMode: deps.errorMode,
    logger: deps.logger,
  });

  const controller = new UserController(userRepository);

  return {
    userRepository,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
