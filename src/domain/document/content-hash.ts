// SHA-256 digests used as the integrity anchor of a registered document

import { createHash, webcrypto } from 'crypto';
import { ContentHash } from '../../domain-types';

export const HASH_ALGORITHM = 'SHA-256';

const SHA256_PATTERN = /^[a-f0-9]{64}$/i;

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(byte => byte.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Computes the SHA-256 hex digest of raw document bytes.
 *
 * WebCrypto digests run on the libuv thread pool, so large uploads do not stall
 * concurrent requests on the event loop.
 */
export async function computeBufferHash(buffer: Uint8Array): Promise<ContentHash> {
  const digest = await webcrypto.subtle.digest(HASH_ALGORITHM, buffer);
  return toHex(new Uint8Array(digest)) as ContentHash;
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Tamper-evidence digest binding a hash code to its content hash
 */
export function computeCombinedHash(hashCode: string, contentHash: string): string {
  return sha256Hex(`${hashCode}:${contentHash.toLowerCase()}`);
}

export function verifyHash(computedHash: string, expectedHash: string): boolean {
  return computedHash.toLowerCase() === expectedHash.toLowerCase();
}

export function isValidSha256(hash: string): hash is ContentHash {
  return SHA256_PATTERN.test(hash);
}

export function formatHashForDisplay(hash: string): string {
  if (hash.length <= 16) return hash;
  return `${hash.slice(0, 8)}...${hash.slice(-8)}`;
}
