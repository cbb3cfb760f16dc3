/**
 * src/shared/security/digest-password-hasher.ts
 *
 * WHY:
 * - Some legacy systems stored a bare hex digest (MD5, SHA-1, SHA-256, ...)
 *   of the LOWER-CASED password. The stored hashes were produced that way,
 *   so verification must lower-case too. This quirk stays in this class.
 *
 * RULES:
 * - Hex output is lowercase; comparison with the stored value is case-sensitive.
 */

import { createHash } from 'node:crypto';

import { constantTimeEquals } from './constant-time';
import type { PasswordHasher } from './password-hasher';

export class DigestPasswordHasher implements PasswordHasher {
  /** @param algorithm a node:crypto digest name, e.g. 'sha256' */
  constructor(private readonly algorithm: string) {}

  async hash(plain: string): Promise<string> {
    return createHash(this.algorithm).update(plain.toLowerCase(), 'utf8').digest('hex');
  }

  async verify(plain: string, stored: string): Promise<boolean> {
    if (!stored) return false;
    return constantTimeEquals(await this.hash(plain), stored);
  }
}
