import { createHash } from 'crypto';

/** SHA-256 hex digest of the (normalised) document text */
export function computeChecksum(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}
