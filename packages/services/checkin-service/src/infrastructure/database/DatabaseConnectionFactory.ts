/**
 * Database connection factory for checkin-service
 * Opens an embedded PostgreSQL (PGlite) and applies the bundled SQL migrations.
 */

import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite';
import { readdirSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getLogger } from '../../config/service-config';
import * as schema from './schema';

const logger = getLogger('checkin-service-databaseconnectionfactory');

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = PgliteDatabase<DatabaseSchema>;

export const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations/', import.meta.url));
export const IN_MEMORY_DATA_DIR = 'memory://';

export interface DatabaseHandle {
  db: DatabaseConnection;
  client: PGlite;
  close(): Promise<void>;
}

/**
 * Runs every .sql file in name order. Statements are idempotent.
 */
export async function applyMigrations(client: PGlite, directory: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = readdirSync(directory)
    .filter(file => file.endsWith('.sql'))
    .sort();
  for (const file of files) {
    await client.exec(readFileSync(path.join(directory, file), 'utf8'));
  }
  return files;
}

/**
 * @param dataDir directory holding the database files, or `memory://` for a throwaway store
 */
export async function createDatabaseConnection(dataDir: string): Promise<DatabaseHandle> {
  const client = await PGlite.create(dataDir);

  let applied: string[];
  try {
    applied = await applyMigrations(client);
  } catch (error) {
    await client.close();
    throw error;
  }
  const db = drizzle(client, { schema });

  logger.info('Check-in database ready', { dataDir, migrations: applied.length });

  return {
    db,
    client,
    close: () => client.close(),
  };
}
