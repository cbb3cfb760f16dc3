/**
 * src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Adaptive salted hash ("blowfish" in legacy configs): the stored string
 *   carries its own salt and cost factor.
 * - We encapsulate bcrypt behind PasswordHasher so the rest of the app stays clean.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const ok = await hasher.verify('secret', storedHash)
 */

import bcrypt from 'bcrypt';
import type { Logger } from '../logger/logger';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;
  private readonly logger?: Logger;

  constructor(opts?: { cost?: number; logger?: Logger }) {
    this.cost = opts?.cost ?? 12;
    this.logger = opts?.logger;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, stored: string): Promise<boolean> {
    if (!stored) return false;

    try {
      return await bcrypt.compare(plain, stored);
    } catch (err: unknown) {
      this.logger?.warn('credentials.malformed', {
        flow: 'credentials.verify',
        scheme: 'bcrypt',
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}
