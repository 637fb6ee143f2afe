/**
 * SHA-256 checksums for rule content and cache fingerprints.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a SHA-256 checksum of the given content.
 * Returns the first 16 characters of the hex digest for brevity.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Fingerprint an ordered list of (identity, checksum) pairs.
 * Any change in order, identity or checksum changes the result.
 */
export function computeFingerprint(parts: ReadonlyArray<readonly [string, string]>): string {
  const hash = createHash('sha256');
  for (const [identity, checksum] of parts) {
    hash.update(identity).update('\0').update(checksum).update('\n');
  }
  return hash.digest('hex').slice(0, 32);
}
