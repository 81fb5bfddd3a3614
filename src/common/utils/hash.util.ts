import * as crypto from 'crypto';

/**
 * SHA256 over one or more string parts. Parts are length-prefixed so
 * `('ab', 'c')` and `('a', 'bc')` hash differently.
 * @returns The hex-encoded digest.
 */
export function createContentHash(...parts: string[]): string {
  const hash = crypto.createHash('sha256');
  for (const part of parts) {
    hash.update(`${part.length}:`).update(part);
  }
  return hash.digest('hex');
}
