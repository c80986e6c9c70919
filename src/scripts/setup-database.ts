/**
 * Database Setup Script
 * Applies db/schema.sql for the Postgres record store
 */

import { config } from 'dotenv';
import { Pool } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';

// Load environment variables from .env file
config();

async function setupDatabase() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to set up the record store schema');
  }

  const schemaPath = process.env.SCHEMA_PATH || join(process.cwd(), 'db', 'schema.sql');
  const pool = new Pool({ connectionString });

  try {
    console.log(`[Setup] Applying ${schemaPath}`);
    await pool.query(readFileSync(schemaPath, 'utf-8'));

    const tables = await pool.query(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public' AND table_name = 'document_records'
    `);
    if ((tables.rowCount ?? 0) === 0) {
      throw new Error('SCHEMA_NOT_APPLIED: document_records is missing');
    }

    console.log('[Setup] document_records is ready');
  } finally {
    await pool.end();
  }
}

setupDatabase().catch((error) => {
  console.error('[Setup] Failed', error);
  process.exit(1);
});
