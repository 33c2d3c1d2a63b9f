import { Pool } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import { createQueryMonitor } from './lib/dbMonitor.js';
import type { Database } from './db/types.js';
import logger from './logger.js';

export interface MetadataDatabase {
  pool: Pool;
  db: Kysely<Database>;
  close: () => Promise<void>;
}

export interface MetadataDatabaseOptions {
  databaseUrl: string;
  sslRejectUnauthorized?: boolean;
}

/** Open the Postgres pool used by the postgres entity-metadata backend. */
export function createMetadataDatabase(options: MetadataDatabaseOptions): MetadataDatabase {
  const databaseUrl = String(options.databaseUrl || '').trim();
  if (!databaseUrl) {
    throw new Error('DATABASE_URL is not configured');
  }
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: options.sslRejectUnauthorized === undefined ? undefined : { rejectUnauthorized: options.sslRejectUnauthorized },
    max: 4,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    statement_timeout: 30000,
  });
  pool.on('error', (err) => {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, '[db] unexpected idle pool client error');
  });
  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
    log: createQueryMonitor('metadata'),
  });

  return {
    pool,
    db,
    close: () => db.destroy(),
  };
}
