/**
 * src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares the users bridge endpoints the identity host calls.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/users', controller.list.bind(controller));
  app.get('/users/count', controller.count.bind(controller));
  app.get('/users/by-username/:username', controller.findByUsername.bind(controller));
  app.get('/users/by-email/:email', controller.findByEmail.bind(controller));
  app.post('/users/credentials/validate', controller.validateCredentials.bind(controller));
  app.put('/users/:username/credentials', controller.updateCredentials.bind(controller));

  app.get('/users/:id', controller.findById.bind(controller));
  app.delete('/users/:id', controller.remove.bind(controller));
}
