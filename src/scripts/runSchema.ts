// Script to run the PostgreSQL schema
// Usage: npm run db:schema

import { loadEnv } from '../config/env';

import { readFileSync } from 'fs';
import { join } from 'path';
import { createPool } from '../config/postgres';
import { dbLogger } from '../utils/logger';

async function runSchema() {
  const env = loadEnv();
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL is required to run the PostgreSQL schema');
  }

  const pool = createPool(env.DATABASE_URL);
  const client = await pool.connect();

  try {
    const schemaPath = join(__dirname, '../../schema.sql');
    dbLogger.info({ schemaPath }, '📖 Reading schema.sql');
    const schemaSQL = readFileSync(schemaPath, 'utf-8');

    // Every statement is IF NOT EXISTS, so the file runs as one batch
    await client.query(schemaSQL);

    const tablesResult = await client.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);

    dbLogger.info({ tables: tablesResult.rows.map((row) => row.table_name) }, '✅ Schema executed successfully');
  } finally {
    client.release();
    await pool.end();
  }
}

runSchema().catch((error: unknown) => {
  dbLogger.error({ err: error }, '❌ Error running schema');
  process.exit(1);
});
