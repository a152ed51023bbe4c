/**
 * Apply the SQL migrations in migrations/ to the analytics database.
 *
 * Files run in filename order, each in its own transaction, and are recorded
 * in schema_migrations so a file is applied at most once.
 *
 * Usage:
 *   npm run db:migrate
 *
 * Environment:
 *   DATABASE_URL or POSTGRES_* vars (see .env.example)
 */

import { config } from 'dotenv';
config();

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pkg from 'pg';
import { loadConfig } from '../server/config';
const { Pool } = pkg;

const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'migrations');

async function main(): Promise<void> {
  const { connectionString } = loadConfig().database;

  // Mask password in log output
  const safeUrl = connectionString.replace(/:([^@/]+)@/, ':****@');
  console.log(`[migrate] Connecting to: ${safeUrl}`);

  const pool = new Pool({ connectionString, max: 1 });
  const client = await pool.connect();
  console.log('[migrate] Connected successfully');

  try {
    const files = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();
    console.log(`[migrate] Found ${files.length} migration files`);

    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        filename TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    for (const file of files) {
      const { rowCount } = await client.query(
        'SELECT 1 FROM schema_migrations WHERE filename = $1',
        [file]
      );
      if (rowCount && rowCount > 0) {
        console.log(`[migrate] Skipping (already applied): ${file}`);
        continue;
      }

      const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      console.log(`[migrate] Running: ${file}`);
      // BEGIN/COMMIT must run on the same checked-out client
      try {
        await client.query('BEGIN');
        await client.query(sqlContent);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        console.log(`[migrate] OK: ${file}`);
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          console.error('[migrate] ROLLBACK failed:', rollbackErr instanceof Error ? rollbackErr.message : rollbackErr);
        }
        console.error(`[migrate] FAILED: ${file}`, err instanceof Error ? err.message : err);
        throw err;
      }
    }

    console.log('[migrate] All migrations completed successfully');
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((err) => {
  console.error('[migrate] Fatal error:', err);
  process.exit(1);
});
