import { Pool } from 'pg';
import { RegistryConfig } from '../config';
import { FileRecordStore } from './file-record-store';
import { PgRecordStore } from './pg-record-store';
import { RecordStore } from './record-store';

export interface RecordStoreHandle {
  store: RecordStore;
  description: string;
  close(): Promise<void>;
}

export function createRecordStore(config: RegistryConfig): RecordStoreHandle {
  if (config.storeDriver === 'postgres') {
    const pool = new Pool({ connectionString: config.databaseUrl });
    return {
      store: new PgRecordStore(pool),
      description: `postgres ${(config.databaseUrl ?? '').replace(/:[^:@]+@/, ':****@')}`,
      close: () => pool.end(),
    };
  }

  return {
    store: new FileRecordStore({
      outputDir: config.outputDir,
      lockRetries: config.lock.retries,
      lockRetryDelayMs: config.lock.retryDelayMs,
      lockStaleMs: config.lock.staleMs,
    }),
    description: `file ${config.outputDir}`,
    close: async () => {},
  };
}
