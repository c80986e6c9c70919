import { PgRecordStore, Queryable } from '../src/store/pg-record-store';
import { toPersistedUnit } from '../src/domain/document/document-record';
import { AlreadyExistsError } from '../src/errors';
import { DocumentRecord } from '../src/domain/document/document-types';
import { code, collect, makeRecord, namespace } from './test-utils';

type QueryResult = { rows: unknown[]; rowCount: number | null };

function fakePool(...results: QueryResult[]) {
  const query = jest.fn<Promise<QueryResult>, [string, unknown[]?]>();
  for (const result of results) {
    query.mockResolvedValueOnce(result);
  }
  const pool: Queryable = { query };
  return { pool, query };
}

function rowFor(record: DocumentRecord) {
  return {
    hash_code: record.hashCode,
    owner_namespace: record.ownerNamespace,
    // pg hands JSONB back already parsed
    unit: JSON.parse(JSON.stringify(toPersistedUnit(record))),
  };
}

describe('PgRecordStore', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('put', () => {
    test('inserts with DO NOTHING and reports a fresh write', async () => {
      const record = makeRecord();
      const { pool, query } = fakePool({ rows: [{ replaced: false }], rowCount: 1 });
      const store = new PgRecordStore(pool);

      const result = await store.put(record, false);

      expect(result).toEqual({
        hashCode: 'CM-A1B2C3D4E5F6',
        location: 'document_records/CM-A1B2C3D4E5F6',
        replaced: false,
      });
      const [sql, values] = query.mock.calls[0];
      expect(sql).toContain('ON CONFLICT (hash_code) DO NOTHING');
      expect(values).toEqual([
        'CM-A1B2C3D4E5F6',
        'ABCDEF',
        'test_app',
        record.traceId,
        JSON.stringify(toPersistedUnit(record)),
      ]);
    });

    test('throws AlreadyExistsError when the insert is skipped', async () => {
      const { pool } = fakePool({ rows: [], rowCount: 0 });
      const store = new PgRecordStore(pool);

      await expect(store.put(makeRecord(), false)).rejects.toThrow(AlreadyExistsError);
    });

    test('overwrite upserts and reports replacement', async () => {
      const { pool, query } = fakePool({ rows: [{ replaced: true }], rowCount: 1 });
      const store = new PgRecordStore(pool);

      const result = await store.put(makeRecord(), true);

      expect(result.replaced).toBe(true);
      expect(query.mock.calls[0][0]).toContain('DO UPDATE SET');
    });
  });

  describe('reads', () => {
    test('getByHashCode restores the record from its unit', async () => {
      const record = makeRecord({ formData: { year: 2025 } });
      const { pool, query } = fakePool({ rows: [rowFor(record)], rowCount: 1 });
      const store = new PgRecordStore(pool);

      expect(await store.getByHashCode(code('CM-A1B2C3D4E5F6'))).toEqual(record);
      expect(query.mock.calls[0][1]).toEqual(['CM-A1B2C3D4E5F6']);
    });

    test('getByHashCode returns null when no row matches', async () => {
      const { pool } = fakePool({ rows: [], rowCount: 0 });
      const store = new PgRecordStore(pool);

      expect(await store.getByHashCode(code('CM-A1B2C3D4E5F6'))).toBeNull();
    });

    test('exists checks the row count', async () => {
      const { pool } = fakePool({ rows: [{}], rowCount: 1 }, { rows: [], rowCount: 0 });
      const store = new PgRecordStore(pool);

      expect(await store.exists(code('CM-A1B2C3D4E5F6'))).toBe(true);
      expect(await store.exists(code('CM-A1B2C3D4E5F6'))).toBe(false);
    });
  });

  describe('iterateAll', () => {
    test('pages through the table by (owner_namespace, hash_code)', async () => {
      const first = makeRecord({ hashCode: code('CM-AAAAAAAAAAAA'), ownerNamespace: namespace('alpha') });
      const second = makeRecord({ hashCode: code('OT-BBBBBBBBBBBB'), ownerNamespace: namespace('alpha') });
      const third = makeRecord({ hashCode: code('CM-CCCCCCCCCCCC'), ownerNamespace: namespace('beta') });
      const { pool, query } = fakePool(
        { rows: [rowFor(first), rowFor(second)], rowCount: 2 },
        { rows: [rowFor(third)], rowCount: 1 }
      );
      const store = new PgRecordStore(pool, { pageSize: 2 });

      const records = await collect(store.iterateAll());

      expect(records.map(r => r.hashCode)).toEqual(['CM-AAAAAAAAAAAA', 'OT-BBBBBBBBBBBB', 'CM-CCCCCCCCCCCC']);
      expect(query).toHaveBeenCalledTimes(2);
      expect(query.mock.calls[0][1]).toEqual(['', '', 2]);
      expect(query.mock.calls[1][1]).toEqual(['alpha', 'OT-BBBBBBBBBBBB', 2]);
    });

    test('keeps paging past a corrupt row at the end of a full page', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      const good = makeRecord({ hashCode: code('CM-AAAAAAAAAAAA'), ownerNamespace: namespace('alpha') });
      const later = makeRecord({ hashCode: code('CM-CCCCCCCCCCCC'), ownerNamespace: namespace('beta') });
      const corrupt = { hash_code: 'IA-BBBBBBBBBBBB', owner_namespace: 'alpha', unit: { version: '1.0' } };
      const { pool, query } = fakePool(
        { rows: [rowFor(good), corrupt], rowCount: 2 },
        { rows: [rowFor(later)], rowCount: 1 }
      );
      const store = new PgRecordStore(pool, { pageSize: 2 });

      const records = await collect(store.iterateAll());

      expect(records.map(r => r.hashCode)).toEqual(['CM-AAAAAAAAAAAA', 'CM-CCCCCCCCCCCC']);
      expect(query.mock.calls[1][1]).toEqual(['alpha', 'IA-BBBBBBBBBBBB', 2]);
      expect(warn).toHaveBeenCalledWith('[Pg Record Store] Skipping corrupt unit', {
        code: 'STORE_CORRUPTION',
        location: 'document_records/IA-BBBBBBBBBBBB',
        reason: 'invalid unit: hash_info Required',
      });
    });

    test('stops after an empty first page', async () => {
      const { pool, query } = fakePool({ rows: [], rowCount: 0 });
      const store = new PgRecordStore(pool);

      expect(await collect(store.iterateAll())).toEqual([]);
      expect(query).toHaveBeenCalledTimes(1);
    });
  });
});
