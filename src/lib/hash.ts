/**
 * Short SHA-256 digests for stable identifiers such as mount tags.
 */

import { createHash } from 'node:crypto';

/**
 * Leading hex characters of the SHA-256 of `content`.
 *
 * @param length - Number of hex characters kept (default 8)
 */
export function shortHash(content: string, length = 8): string {
  return createHash('sha256').update(content).digest('hex').slice(0, length);
}
