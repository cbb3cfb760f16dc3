/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates the external database client ONCE and shares it safely.
 * - Keeps modules testable (tests can hand in their own DataSourceProvider).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import { KyselyDataSource, staticDataSourceProvider } from '../shared/db/data-source';
import type { DataSourceProvider, ExternalDb } from '../shared/db/data-source';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

export type AppDeps = {
  db: ExternalDb | null;
  dataSources: DataSourceProvider;

  logger: Logger;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  overrides: { dataSources?: DataSourceProvider } = {},
): Promise<AppDeps> {
  logger.level = config.logLevel;

  // No DATABASE_URL: the store stays up and reports every query as unavailable.
  const db =
    overrides.dataSources || !config.database.url
      ? null
      : createDb(config.queries.dialect, config.database.url, { max: config.database.poolMax });

  if (!db && !overrides.dataSources) {
    logger.warn('db.not_configured', { dialect: config.queries.dialect });
  }

  const dataSources =
    overrides.dataSources ?? staticDataSourceProvider(db ? new KyselyDataSource(db) : undefined);

  // modules (no HTTP / no business logic here)
  const users = createUserModule({
    dataSources,
    queries: config.queries,
    errorMode: config.queryErrorMode,
    logger,
  });

  return {
    db,
    dataSources,
    logger,
    users,
    close: async () => {
      await db?.destroy();
    },
  };
}
