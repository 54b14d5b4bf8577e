import { createHash, timingSafeEqual } from 'crypto';

/**
 * Constant-time string comparison. Both sides are hashed first so the
 * comparison does not leak the length of the expected value.
 */
export function safeEqual(expected: string, provided: string): boolean {
  const a = createHash('sha256').update(expected, 'utf8').digest();
  const b = createHash('sha256').update(provided, 'utf8').digest();
  return timingSafeEqual(a, b);
}
