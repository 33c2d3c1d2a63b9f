import type { Kysely } from 'kysely';

import type { Database } from '../db/types.js';
import type { CooldownPolicy } from '../lib/entityState.js';
import { PersistenceError, errorMessage } from '../lib/errors.js';
import { CachedEntityMetadataStore, type StoredEntityState } from './entityMetadataStore.js';

function toMs(value: Date | string | null): number | null {
  if (value === null) return null;
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  return Number.isFinite(ms) ? ms : null;
}

function toDate(ms: number | null): Date | null {
  return ms === null ? null : new Date(ms);
}

/**
 * Entity metadata kept in the `entity_state` table. The whole table is read
 * on load; each mutation upserts the one changed row.
 */
export class PostgresEntityMetadataStore extends CachedEntityMetadataStore {
  constructor(
    private readonly db: Kysely<Database>,
    policy: CooldownPolicy,
  ) {
    super(policy);
  }

  protected async readAll(): Promise<StoredEntityState[]> {
    try {
      const rows = await this.db
        .selectFrom('entity_state')
        .select(['ticker', 'interval', 'last_success_at', 'consecutive_errors', 'last_error_at', 'in_cooldown_until'])
        .execute();
      return rows.map((row) => ({
        entity: row.ticker,
        interval: row.interval,
        state: {
          lastSuccessAt: toMs(row.last_success_at),
          consecutiveErrors: Math.max(0, Number(row.consecutive_errors) || 0),
          lastErrorAt: toMs(row.last_error_at),
          inCooldownUntil: toMs(row.in_cooldown_until),
        },
      }));
    } catch (err: unknown) {
      throw new PersistenceError(`Failed to load entity_state: ${errorMessage(err)}`, { cause: err });
    }
  }

  protected async persist({ entity, interval, state }: StoredEntityState): Promise<void> {
    const values = {
      last_success_at: toDate(state.lastSuccessAt),
      consecutive_errors: state.consecutiveErrors,
      last_error_at: toDate(state.lastErrorAt),
      in_cooldown_until: toDate(state.inCooldownUntil),
      updated_at: new Date(),
    };
    try {
      await this.db
        .insertInto('entity_state')
        .values({ ticker: entity, interval, ...values })
        .onConflict((oc) => oc.columns(['ticker', 'interval']).doUpdateSet(values))
        .execute();
    } catch (err: unknown) {
      throw new PersistenceError(`Failed to upsert entity_state ${interval}/${entity}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
