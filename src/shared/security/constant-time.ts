import { timingSafeEqual } from 'node:crypto';

/**
 * Exact (case-sensitive) string equality without an early exit on the first
 * differing byte. Length differences still return immediately.
 */
export function constantTimeEquals(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
