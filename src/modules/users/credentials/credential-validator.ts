/**
 * src/modules/users/credentials/credential-validator.ts
 *
 * WHY:
 * - Picks the PasswordHasher for the configured HashScheme once, at construction.
 * - Keeps scheme quirks (digest lower-casing, PBKDF2 field layout) out of the facade.
 *
 * RULES:
 * - No DB access here: the facade fetches the stored credential.
 * - Absent/empty stored credential -> false. Malformed -> false. Never throws for either.
 */

import { BcryptPasswordHasher } from '../../../shared/security/bcrypt-password-hasher';
import { DigestPasswordHasher } from '../../../shared/security/digest-password-hasher';
import { Pbkdf2Sha256PasswordHasher } from '../../../shared/security/pbkdf2-password-hasher';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { Logger } from '../../../shared/logger/logger';
import type { HashScheme } from './hash-scheme';

export function createPasswordHasher(scheme: HashScheme, logger?: Logger): PasswordHasher {
  switch (scheme.kind) {
    case 'adaptive':
      return new BcryptPasswordHasher({ logger });
    case 'pbkdf2-sha256':
      return new Pbkdf2Sha256PasswordHasher({ logger });
    case 'digest':
      return new DigestPasswordHasher(scheme.algorithm);
  }
}

export class CredentialValidator {
  private readonly hasher: PasswordHasher;

  constructor(
    readonly scheme: HashScheme,
    opts: { logger?: Logger; hasher?: PasswordHasher } = {},
  ) {
    this.hasher = opts.hasher ?? createPasswordHasher(scheme, opts.logger);
  }

  async matches(password: string, stored: string | undefined): Promise<boolean> {
    if (stored === undefined || stored === '') return false;
    return this.hasher.verify(password, stored);
  }
}
