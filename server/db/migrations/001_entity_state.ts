import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('entity_state')
    .ifNotExists()
    .addColumn('ticker', 'varchar(20)', (col) => col.notNull())
    .addColumn('interval', 'varchar(16)', (col) => col.notNull())
    .addColumn('last_success_at', 'timestamptz')
    .addColumn('consecutive_errors', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('last_error_at', 'timestamptz')
    .addColumn('in_cooldown_until', 'timestamptz')
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`NOW()`))
    .addPrimaryKeyConstraint('entity_state_pkey', ['ticker', 'interval'])
    .execute();

  await sql`CREATE INDEX IF NOT EXISTS idx_entity_state_interval_last_success ON entity_state (interval, last_success_at)`.execute(
    db,
  );
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('entity_state').ifExists().execute();
}
