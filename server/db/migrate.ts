import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Migrator, FileMigrationProvider, Kysely } from 'kysely';

import logger from '../logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export async function runMigrations(db: Kysely<any>): Promise<void> {
  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      // The migrations folder sits next to this file
      migrationFolder: path.join(__dirname, 'migrations'),
    }),
  });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((it) => {
    if (it.status === 'Success') {
      logger.info({ migration: it.migrationName }, '[db] migration executed');
    } else if (it.status === 'Error') {
      logger.error({ migration: it.migrationName }, '[db] migration failed');
    }
  });

  if (error) {
    logger.error('[db] failed to run migrations');
    throw error;
  }
}
