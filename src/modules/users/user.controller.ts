/**
 * src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> repository call for the host bridge.
 * - Validates request payload and returns response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { withRequestContext } from '../../shared/logger/with-context';
import { UserErrors } from './user.errors';
import type { UserRepository } from './user.repository';
import {
  countUsersQuerySchema,
  emailParamsSchema,
  listUsersQuerySchema,
  updateCredentialsSchema,
  userIdParamsSchema,
  usernameParamsSchema,
  validateCredentialsSchema,
} from './user.schemas';

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid ${what}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export class UserController {
  constructor(private readonly users: UserRepository) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const query = parseOrThrow(listUsersQuerySchema, req.query, 'query string');

    const pageable =
      query.offset !== undefined && query.limit !== undefined
        ? { offset: query.offset, limit: query.limit }
        : undefined;

    const users =
      query.search || pageable
        ? await this.users.findUsers(query.search, pageable)
        : await this.users.getAllUsers();

    return reply.status(200).send({ users });
  }

  async count(req: FastifyRequest, reply: FastifyReply) {
    const query = parseOrThrow(countUsersQuerySchema, req.query, 'query string');
    const count = await this.users.getUsersCount(query.search);
    return reply.status(200).send({ count });
  }

  async findById(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'path parameters');
    const user = await this.users.findUserById(id);
    if (!user) throw UserErrors.userNotFound();
    return reply.status(200).send(user);
  }

  async findByUsername(req: FastifyRequest, reply: FastifyReply) {
    const { username } = parseOrThrow(usernameParamsSchema, req.params, 'path parameters');
    const user = await this.users.findUserByUsername(username);
    if (!user) throw UserErrors.userNotFound();
    return reply.status(200).send(user);
  }

  async findByEmail(req: FastifyRequest, reply: FastifyReply) {
    const { email } = parseOrThrow(emailParamsSchema, req.params, 'path parameters');
    const user = await this.users.findUserByEmail(email);
    if (!user) throw UserErrors.userNotFound();
    return reply.status(200).send(user);
  }

  async validateCredentials(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(validateCredentialsSchema, req.body, 'request body');
    const valid = await this.users.validateCredentials(body.username, body.password);

    withRequestContext(req).info('credentials.validate', {
      flow: 'credentials.validate',
      valid,
    });

    return reply.status(200).send({ valid });
  }

  async updateCredentials(req: FastifyRequest, reply: FastifyReply) {
    const { username } = parseOrThrow(usernameParamsSchema, req.params, 'path parameters');
    const body = parseOrThrow(updateCredentialsSchema, req.body, 'request body');
    const updated = await this.users.updateCredentials(username, body.password);
    return reply.status(200).send({ updated });
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const { id } = parseOrThrow(userIdParamsSchema, req.params, 'path parameters');
    if (!this.users.removeUser()) {
      throw UserErrors.removalNotAllowed({ id });
    }

    withRequestContext(req).info('users.remove_allowed', { flow: 'users.remove', id });
    return reply.status(204).send();
  }
}
