/**
 * src/shared/security/pbkdf2-password-hasher.ts
 *
 * WHY:
 * - Iterated keyed derivation exported by older systems as
 *   `$<iterations>$<salt>$<derivedKey>` (PBKDF2-HMAC-SHA256, 256-bit key).
 * - The derived key is hex in most exports; Django-style exports use base64.
 *   The stored field's shape decides which encoding we compare against.
 *
 * RULES:
 * - Salt is used as its UTF-8 bytes, exactly as stored.
 * - Anything that does not parse (field count, iterations, empty salt/key) resolves false.
 * - Iteration counts above MAX_PBKDF2_ITERATIONS count as malformed.
 */

import { pbkdf2, randomBytes } from 'node:crypto';
import { promisify } from 'node:util';

import type { Logger } from '../logger/logger';
import { constantTimeEquals } from './constant-time';
import type { PasswordHasher } from './password-hasher';

const pbkdf2Async = promisify(pbkdf2);

const DIGEST = 'sha256';
const KEY_LENGTH_BYTES = 32;
const HEX_KEY = /^[0-9a-fA-F]{64}$/;
// Above this a single verification blocks a threadpool thread for minutes.
export const MAX_PBKDF2_ITERATIONS = 10_000_000;

export type Pbkdf2Credential = {
  iterations: number;
  salt: string;
  derivedKey: string;
};

/** Parses `$<iterations>$<salt>$<derivedKey>`; undefined when malformed. */
export function parsePbkdf2Credential(stored: string): Pbkdf2Credential | undefined {
  const fields = stored.split('$');
  if (fields.length !== 4) return undefined;

  const [leading, iterationsText, salt, derivedKey] = fields;
  if (leading !== '' || !iterationsText || !salt || !derivedKey) return undefined;
  if (!/^\d+$/.test(iterationsText)) return undefined;

  const iterations = Number.parseInt(iterationsText, 10);
  if (!Number.isSafeInteger(iterations) || iterations < 1) return undefined;
  if (iterations > MAX_PBKDF2_ITERATIONS) return undefined;

  return { iterations, salt, derivedKey };
}

export class Pbkdf2Sha256PasswordHasher implements PasswordHasher {
  private readonly iterations: number;
  private readonly logger?: Logger;

  constructor(opts?: { iterations?: number; logger?: Logger }) {
    this.iterations = opts?.iterations ?? 260_000;
    this.logger = opts?.logger;
  }

  async hash(plain: string): Promise<string> {
    const salt = randomBytes(12).toString('base64url');
    const key = await derive(plain, salt, this.iterations);
    return `$${this.iterations}$${salt}$${key.toString('hex')}`;
  }

  async verify(plain: string, stored: string): Promise<boolean> {
    const credential = parsePbkdf2Credential(stored);
    if (!credential) {
      this.logger?.warn('credentials.malformed', {
        flow: 'credentials.verify',
        scheme: 'pbkdf2-sha256',
      });
      return false;
    }

    const key = await derive(plain, credential.salt, credential.iterations);

    if (HEX_KEY.test(credential.derivedKey)) {
      return constantTimeEquals(key.toString('hex'), credential.derivedKey.toLowerCase());
    }
    return constantTimeEquals(key.toString('base64'), credential.derivedKey);
  }
}

function derive(plain: string, salt: string, iterations: number): Promise<Buffer> {
  return pbkdf2Async(
    Buffer.from(plain, 'utf8'),
    Buffer.from(salt, 'utf8'),
    iterations,
    KEY_LENGTH_BYTES,
    DIGEST,
  );
}
