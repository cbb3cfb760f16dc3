/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the users bridge endpoints.
 * - Prevents invalid payloads from reaching the repository.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - offset and limit come together or not at all.
 */

import { z } from 'zod';

const pageNumber = z.coerce.number().int().min(0);

export const listUsersQuerySchema = z
  .object({
    search: z.string().optional(),
    offset: pageNumber.optional(),
    limit: pageNumber.max(1000).optional(),
  })
  .refine((q) => (q.offset === undefined) === (q.limit === undefined), {
    message: 'offset and limit must be provided together',
    path: ['limit'],
  });

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;

export const countUsersQuerySchema = z.object({
  search: z.string().optional(),
});

export const userIdParamsSchema = z.object({
  id: z.string().regex(/^-?\d+$/, 'User id must be an integer'),
});

export const usernameParamsSchema = z.object({
  username: z.string().min(1),
});

export const emailParamsSchema = z.object({
  email: z.string().min(1),
});

export const validateCredentialsSchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export type ValidateCredentialsInput = z.infer<typeof validateCredentialsSchema>;

export const updateCredentialsSchema = z.object({
  password: z.string().min(1, 'Password is required'),
});
