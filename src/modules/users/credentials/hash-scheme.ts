/**
 * src/modules/users/credentials/hash-scheme.ts
 *
 * WHY:
 * - Which legacy encoding the stored credentials use is a configuration fact.
 *   We resolve it ONCE into a closed union instead of re-reading strings per login.
 *
 * RULES:
 * - adaptiveHash wins over hashFunction.
 * - "PBKDF2-SHA256" selects iterated derivation; any other identifier is a digest name
 *   in legacy notation (MD5, SHA-1, SHA-256, SHA-512/256, SHA3-256, ...).
 * - A digest node:crypto cannot compute is a CONFIGURATION_ERROR at startup, not a
 *   failed login later.
 */

import { getHashes } from 'node:crypto';

import { AppError } from '../../../shared/http/errors';

export type HashScheme =
  | { kind: 'adaptive' }
  | { kind: 'pbkdf2-sha256' }
  | {
      kind: 'digest';
      /** node:crypto digest name */
      algorithm: string;
      /** identifier as configured */
      name: string;
    };

export const PBKDF2_SHA256 = 'PBKDF2-SHA256';

/** Maps legacy digest notation to node:crypto's: "SHA-512/256" -> "sha512-256". */
export function toNodeDigestName(name: string): string {
  const lower = name.trim().toLowerCase();
  if (lower === 'sha') return 'sha1';
  return lower.replace(/^sha-/, 'sha').replace('/', '-');
}

export function resolveHashScheme(config: {
  adaptiveHash: boolean;
  hashFunction: string;
}): HashScheme {
  if (config.adaptiveHash) return { kind: 'adaptive' };

  const name = config.hashFunction.trim();
  if (name.toUpperCase() === PBKDF2_SHA256) return { kind: 'pbkdf2-sha256' };

  const algorithm = toNodeDigestName(name);
  if (!algorithm || !getHashes().includes(algorithm)) {
    throw AppError.configuration(`Unsupported hash function: ${config.hashFunction}`, {
      hashFunction: config.hashFunction,
    });
  }

  return { kind: 'digest', algorithm, name };
}
