import { z } from 'zod';
import { HashCode } from '../domain-types';
import { DocumentRecord } from '../domain/document/document-types';
import { fromPersistedUnit, toPersistedUnit } from '../domain/document/document-record';
import { AlreadyExistsError } from '../errors';
import { PutResult, RecordStore, reportCorruption } from './record-store';

const STORE_NAME = 'Pg Record Store';

// The subset of pg's Pool the store relies on
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const recordRowSchema = z.object({
  hash_code: z.string(),
  owner_namespace: z.string(),
  unit: z.unknown(),
});

// === WATERMARK ===
interface RecordWatermark {
  ownerNamespace: string;
  hashCode: string;
}

const ZERO_WATERMARK: RecordWatermark = { ownerNamespace: '', hashCode: '' };

export interface PgRecordStoreOptions {
  pageSize?: number;
}

export class PgRecordStore implements RecordStore {
  private readonly pageSize: number;

  constructor(private pool: Queryable, options: PgRecordStoreOptions = {}) {
    this.pageSize = options.pageSize ?? 500;
  }

  async put(record: DocumentRecord, overwrite: boolean): Promise<PutResult> {
    const conflictClause = overwrite
      ? `DO UPDATE SET
          short_code = EXCLUDED.short_code,
          owner_namespace = EXCLUDED.owner_namespace,
          trace_id = EXCLUDED.trace_id,
          unit = EXCLUDED.unit,
          created_at = NOW()`
      : 'DO NOTHING';

    const sql = `
      INSERT INTO document_records (
        hash_code,
        short_code,
        owner_namespace,
        trace_id,
        unit
      ) VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (hash_code) ${conflictClause}
      RETURNING (xmax <> 0) AS replaced
    `;

    const result = await this.pool.query(sql, [
      record.hashCode,
      record.shortCode,
      record.ownerNamespace,
      record.traceId,
      JSON.stringify(toPersistedUnit(record)),
    ]);

    if ((result.rowCount ?? 0) === 0) {
      throw new AlreadyExistsError(record.hashCode);
    }

    const returned = z.object({ replaced: z.boolean() }).safeParse(result.rows[0]);
    return {
      hashCode: record.hashCode,
      location: `document_records/${record.hashCode}`,
      replaced: returned.success ? returned.data.replaced : false,
    };
  }

  async getByHashCode(hashCode: HashCode): Promise<DocumentRecord | null> {
    const result = await this.pool.query(
      'SELECT hash_code, owner_namespace, unit FROM document_records WHERE hash_code = $1',
      [hashCode]
    );
    for (const row of result.rows) {
      const record = this.toRecord(row);
      if (record) return record;
    }
    return null;
  }

  async exists(hashCode: HashCode): Promise<boolean> {
    const result = await this.pool.query(
      'SELECT 1 FROM document_records WHERE hash_code = $1 LIMIT 1',
      [hashCode]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async *iterateAll(): AsyncGenerator<DocumentRecord> {
    let watermark = ZERO_WATERMARK;
    while (true) {
      const page = await this.fetchSince(watermark);
      for (const row of page) {
        const record = this.toRecord(row);
        if (record) {
          yield record;
        }
      }
      if (page.length < this.pageSize) {
        return;
      }
      // Key columns are NOT NULL, so the last row always carries a watermark
      const last = recordRowSchema.parse(page[page.length - 1]);
      watermark = { ownerNamespace: last.owner_namespace, hashCode: last.hash_code };
    }
  }

  // Exclusive keyset pagination on (owner_namespace, hash_code)
  private async fetchSince(watermark: RecordWatermark): Promise<unknown[]> {
    const sql = `
      SELECT hash_code, owner_namespace, unit
      FROM document_records
      WHERE (owner_namespace, hash_code) > ($1, $2)
      ORDER BY owner_namespace ASC, hash_code ASC
      LIMIT $3
    `;

    const result = await this.pool.query(sql, [
      watermark.ownerNamespace,
      watermark.hashCode,
      this.pageSize,
    ]);
    return result.rows;
  }

  private toRecord(raw: unknown): DocumentRecord | null {
    const row = recordRowSchema.safeParse(raw);
    if (!row.success) {
      reportCorruption(STORE_NAME, 'document_records', 'row is missing key columns');
      return null;
    }

    const location = `document_records/${row.data.hash_code}`;
    const parsed = fromPersistedUnit(row.data.unit, row.data.owner_namespace);
    if (!parsed.ok) {
      reportCorruption(STORE_NAME, location, parsed.error);
      return null;
    }
    return parsed.value;
  }
}
