import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase, type PgliteQueryResultHKT } from 'drizzle-orm/pglite';
import type { PgDatabase } from 'drizzle-orm/pg-core';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Same relative location from src/db and dist/db
const SCHEMA_PATH = join(__dirname, '../../db/schema.sql');

export const IN_MEMORY = ':memory:';

export type AppDatabase = PgliteDatabase & { $client: PGlite };

// The database itself or an open transaction
export type DbExecutor = PgDatabase<PgliteQueryResultHKT>;

/**
 * Open (or create) the embedded Postgres database and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export async function openDatabase(dataDir: string): Promise<AppDatabase> {
  const client = dataDir === IN_MEMORY ? new PGlite() : new PGlite(dataDir);

  await client.exec(await readFile(SCHEMA_PATH, 'utf-8'));
  if (dataDir !== IN_MEMORY) {
    console.log(`[DB] Schema applied to ${dataDir}`);
  }

  return drizzle(client);
}

export async function closeDatabase(db: AppDatabase): Promise<void> {
  await db.$client.close();
}

/**
 * True when the error (or its cause) is a unique constraint violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && error.code === '23505') return true;
  return error.cause !== undefined && isUniqueViolation(error.cause);
}
