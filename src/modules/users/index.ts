/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module for hosts embedding it as a library.
 * - Prevent deep imports into /dal or /credentials.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { UserRepository } from './user.repository';
export { createQueryConfiguration } from './user.config';
export type { QueryConfigurationInput } from './user.config';
export { resolveHashScheme } from './credentials/hash-scheme';
export type { HashScheme } from './credentials/hash-scheme';
export type { Pageable, QueryConfiguration, QueryErrorMode, UserRecord } from './user.types';
