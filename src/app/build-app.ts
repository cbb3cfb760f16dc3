/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DataSourceProvider } from '../shared/db/data-source';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(
  config: AppConfig,
  overrides: { dataSources?: DataSourceProvider } = {},
) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer();

  registerRoutes(app, { config, deps });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
