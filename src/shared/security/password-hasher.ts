/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Stored credentials come from several legacy systems (bcrypt, PBKDF2, plain digests).
 * - The credential validator depends on this interface, not on a concrete scheme.
 *
 * HOW TO USE:
 * - const ok = await hasher.verify(password, storedHash)
 * - hash() produces a credential in the same legacy format (fixtures, operator tooling).
 *
 * RULES:
 * - verify() never throws on a malformed stored value: it resolves false.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, stored: string): Promise<boolean>;
}
