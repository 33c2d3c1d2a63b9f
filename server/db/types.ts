import type { ColumnType } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface EntityStateTable {
  ticker: string;
  interval: string;
  last_success_at: Timestamp | null;
  consecutive_errors: number;
  last_error_at: Timestamp | null;
  in_cooldown_until: Timestamp | null;
  updated_at: ColumnType<Date, Date | string | undefined, Date | string>;
}

export interface Database {
  entity_state: EntityStateTable;
}
