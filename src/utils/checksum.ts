/**
 * SHA-256 checksums for generated files, recorded in the answers file so
 * update mode can tell regenerated output from files the user edited.
 */
import { createHash } from 'node:crypto';

/**
 * First 16 hex characters of the SHA-256 digest of `content`.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

export function verifyChecksum(content: string, storedChecksum: string): boolean {
  return computeChecksum(content) === storedChecksum;
}
