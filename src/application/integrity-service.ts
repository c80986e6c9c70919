import { HashCode } from '../domain-types';
import { computeBufferHash, formatHashForDisplay, verifyHash } from '../domain/document/content-hash';
import { LookupFailure, LookupService } from './lookup-service';

export interface IntegrityResult {
  valid: boolean;
  hashCode: HashCode;
  calculatedHash: string;
  storedHash: string;
  message: string;
}

export type IntegrityOutcome =
  | { status: 'VERIFIED'; result: IntegrityResult }
  | LookupFailure;

export const INTEGRITY_MESSAGES = {
  AUTHENTIC: 'Document is authentic and unmodified',
  MODIFIED: 'Document has been modified or is not authentic',
  NO_STORED_HASH: 'No content hash was registered for this document',
} as const;

export class IntegrityService {
  constructor(private lookup: LookupService) {}

  /**
   * Re-hashes submitted bytes and compares them with the digest stored at registration.
   * Both digests are returned on mismatch.
   */
  async verifyIntegrity(hashCode: string, content: Uint8Array): Promise<IntegrityOutcome> {
    const lookup = await this.lookup.resolve(hashCode);
    if (lookup.status !== 'FOUND') {
      return lookup;
    }

    const { record } = lookup;
    const calculatedHash = await computeBufferHash(content);
    const storedHash = record.contentHash;

    let valid = false;
    let message: string = INTEGRITY_MESSAGES.NO_STORED_HASH;
    if (storedHash) {
      valid = verifyHash(calculatedHash, storedHash);
      message = valid ? INTEGRITY_MESSAGES.AUTHENTIC : INTEGRITY_MESSAGES.MODIFIED;
    }

    console.log('[Integrity] Verification completed', {
      hashCode: record.hashCode,
      valid,
      calculatedHash: formatHashForDisplay(calculatedHash),
      storedHash: formatHashForDisplay(storedHash),
    });

    return {
      status: 'VERIFIED',
      result: {
        valid,
        hashCode: record.hashCode,
        calculatedHash,
        storedHash,
        message,
      },
    };
  }
}
