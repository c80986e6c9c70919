import { HashCode } from '../domain-types';
import { DocumentRecord } from '../domain/document/document-types';
import { AlreadyExistsError } from '../errors';
import { PutResult, RecordStore } from './record-store';

/**
 * Process-local store. The check and the write in `put` run without an intervening
 * await, which makes them atomic on the event loop.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<HashCode, DocumentRecord>();

  async put(record: DocumentRecord, overwrite: boolean): Promise<PutResult> {
    const replaced = this.records.has(record.hashCode);
    if (replaced && !overwrite) {
      throw new AlreadyExistsError(record.hashCode);
    }
    this.records.set(record.hashCode, structuredClone(record));
    return {
      hashCode: record.hashCode,
      location: `memory://${record.ownerNamespace}/${record.hashCode}`,
      replaced,
    };
  }

  async getByHashCode(hashCode: HashCode): Promise<DocumentRecord | null> {
    const record = this.records.get(hashCode);
    return record ? structuredClone(record) : null;
  }

  async exists(hashCode: HashCode): Promise<boolean> {
    return this.records.has(hashCode);
  }

  async *iterateAll(): AsyncGenerator<DocumentRecord> {
    // Namespace first, then hash code, matching the other drivers
    const ordered = [...this.records.values()].sort((a, b) => {
      if (a.ownerNamespace !== b.ownerNamespace) {
        return a.ownerNamespace < b.ownerNamespace ? -1 : 1;
      }
      return a.hashCode < b.hashCode ? -1 : a.hashCode > b.hashCode ? 1 : 0;
    });
    for (const record of ordered) {
      yield structuredClone(record);
    }
  }
}
