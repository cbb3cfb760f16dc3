/**
 * src/modules/users/user.config.ts
 *
 * WHY:
 * - Builds the immutable QueryConfiguration once, from whatever source the
 *   composition root reads (env today).
 *
 * RULES:
 * - Validation happens here; nothing downstream re-checks templates or flags.
 * - The returned object is frozen.
 */

import { z } from 'zod';

import { parseDialect } from '../../shared/db/pagination';
import { AppError } from '../../shared/http/errors';
import type { QueryConfiguration } from './user.types';

const sqlTemplate = z.string().trim().min(1, 'SQL template must not be empty');

export const queryConfigurationSchema = z.object({
  dialect: z.string().min(1),
  listAll: sqlTemplate,
  count: sqlTemplate,
  findById: sqlTemplate,
  findByUsername: sqlTemplate,
  findByEmail: sqlTemplate,
  findBySearchTerm: sqlTemplate,
  findPasswordHash: sqlTemplate,
  hashFunction: z.string().trim().min(1).default('SHA-256'),
  adaptiveHash: z.boolean().default(false),
  allowDelete: z.boolean().default(false),
});

export type QueryConfigurationInput = z.input<typeof queryConfigurationSchema>;

export function createQueryConfiguration(input: QueryConfigurationInput): QueryConfiguration {
  const parsed = queryConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw AppError.configuration('Invalid query configuration', {
      issues: parsed.error.issues,
    });
  }

  return Object.freeze({
    ...parsed.data,
    dialect: parseDialect(parsed.data.dialect),
  });
}
