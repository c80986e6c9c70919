import { HashCode } from '../domain-types';
import { DocumentRecord } from '../domain/document/document-types';
import { StoreCorruptionWarning } from '../errors';

export interface PutResult {
  hashCode: HashCode;
  // Where the unit landed: a file path, or a table/key reference
  location: string;
  replaced: boolean;
}

/**
 * Durable per-document metadata, grouped by owner namespace.
 *
 * `put` is atomic per hash code: the uniqueness check and the write behave as one
 * step, and no partially written record is ever observable by a reader.
 * `iterateAll` yields namespaces in a stable order, then records within each
 * namespace in a stable order. Units that cannot be read are skipped.
 */
export interface RecordStore {
  /** @throws AlreadyExistsError when the code exists and `overwrite` is false */
  put(record: DocumentRecord, overwrite: boolean): Promise<PutResult>;
  getByHashCode(hashCode: HashCode): Promise<DocumentRecord | null>;
  iterateAll(): AsyncIterable<DocumentRecord>;
  exists(hashCode: HashCode): Promise<boolean>;
}

export function reportCorruption(store: string, location: string, reason: string): StoreCorruptionWarning {
  const warning = new StoreCorruptionWarning(location, reason);
  console.warn(`[${store}] Skipping corrupt unit`, {
    code: warning.code,
    location,
    reason,
  });
  return warning;
}
