import { createQueryConfiguration } from '../../src/modules/users/user.config';
import type { QueryConfigurationInput } from '../../src/modules/users/user.config';
import type { QueryConfiguration } from '../../src/modules/users/user.types';

const COLUMNS = 'id, username, email, first_name, last_name';

export const PG_TEMPLATES = {
  listAll: `select ${COLUMNS} from users order by id`,
  count: 'select count(*) from users',
  findById: `select ${COLUMNS} from users where id = $1`,
  findByUsername: `select ${COLUMNS} from users where username = $1`,
  findByEmail: `select ${COLUMNS} from users where email = $1`,
  findBySearchTerm: `select ${COLUMNS} from users where username like $1 order by id`,
  findPasswordHash: 'select password_hash from users where username = $1',
} as const;

export function buildQueryConfig(
  overrides: Partial<QueryConfigurationInput> = {},
): QueryConfiguration {
  return createQueryConfiguration({
    dialect: 'postgresql',
    ...PG_TEMPLATES,
    ...overrides,
  });
}
