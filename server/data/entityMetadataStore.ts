import * as path from 'path';
import { z } from 'zod';

import { readJsonFile, writeJsonAtomic } from '../lib/atomicFile.js';
import {
  applyCooldownOverride,
  applyFailure,
  applySuccess,
  settleExpiredCooldown,
  type CooldownPolicy,
} from '../lib/entityState.js';
import { PersistenceError } from '../lib/errors.js';
import { SerialQueue } from '../lib/serialQueue.js';
import type { EntityState } from '../lib/types.js';

/**
 * Durable (ticker, interval) → EntityState mapping.
 *
 * Reads are served from memory. Every mutation goes through a single
 * serialized writer and is persisted before the returned promise resolves.
 * Records are never deleted.
 */
export interface EntityMetadataStore {
  load(): Promise<void>;
  get(entity: string, interval: string): EntityState | undefined;
  /** Effective state per ticker for one interval; expired cooldowns already settled. */
  snapshot(interval: string, now: number): Map<string, EntityState>;
  recordSuccess(entity: string, interval: string, at: number): Promise<EntityState>;
  recordFailure(entity: string, interval: string, at: number): Promise<EntityState>;
  /** Operator override: lift an active cooldown. */
  clearCooldown(entity: string, interval: string): Promise<EntityState>;
  intervals(): string[];
}

export interface StoredEntityState {
  entity: string;
  interval: string;
  state: EntityState;
}

/**
 * Shared in-memory cache, transition logic and write serialization. Backends
 * supply how the records are read and how a changed record is persisted.
 */
export abstract class CachedEntityMetadataStore implements EntityMetadataStore {
  protected readonly records = new Map<string, Map<string, EntityState>>();
  private readonly writer = new SerialQueue();
  private loaded = false;

  constructor(protected readonly policy: CooldownPolicy) {}

  protected abstract readAll(): Promise<StoredEntityState[]>;
  protected abstract persist(changed: StoredEntityState): Promise<void>;

  async load(): Promise<void> {
    await this.writer.run(async () => {
      const rows = await this.readAll();
      this.records.clear();
      for (const row of rows) {
        this.bucket(row.interval).set(row.entity, { ...row.state });
      }
      this.loaded = true;
    });
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get(entity: string, interval: string): EntityState | undefined {
    const state = this.records.get(interval)?.get(entity);
    return state ? { ...state } : undefined;
  }

  snapshot(interval: string, now: number): Map<string, EntityState> {
    const out = new Map<string, EntityState>();
    for (const [entity, state] of this.records.get(interval) ?? []) {
      out.set(entity, settleExpiredCooldown({ ...state }, now));
    }
    return out;
  }

  recordSuccess(entity: string, interval: string, at: number): Promise<EntityState> {
    return this.mutate(entity, interval, (state) => applySuccess(state, at));
  }

  recordFailure(entity: string, interval: string, at: number): Promise<EntityState> {
    return this.mutate(entity, interval, (state) => applyFailure(state, at, this.policy));
  }

  clearCooldown(entity: string, interval: string): Promise<EntityState> {
    return this.mutate(entity, interval, (state) => applyCooldownOverride(state));
  }

  intervals(): string[] {
    return [...this.records.keys()];
  }

  /** Every record, for backends that persist the full mapping. */
  protected allRecords(): StoredEntityState[] {
    const rows: StoredEntityState[] = [];
    for (const [interval, bucket] of this.records) {
      for (const [entity, state] of bucket) {
        rows.push({ entity, interval, state });
      }
    }
    return rows;
  }

  private mutate(
    entity: string,
    interval: string,
    transition: (state: EntityState | undefined) => EntityState,
  ): Promise<EntityState> {
    return this.writer.run(async () => {
      const bucket = this.bucket(interval);
      const previous = bucket.get(entity);
      const next = transition(previous ? { ...previous } : undefined);
      bucket.set(entity, next);
      try {
        await this.persist({ entity, interval, state: next });
      } catch (err: unknown) {
        // Keep memory identical to what is durably stored.
        if (previous) bucket.set(entity, previous);
        else bucket.delete(entity);
        throw err;
      }
      return { ...next };
    });
  }

  private bucket(interval: string): Map<string, EntityState> {
    let bucket = this.records.get(interval);
    if (!bucket) {
      bucket = new Map();
      this.records.set(interval, bucket);
    }
    return bucket;
  }
}

// ---------------------------------------------------------------------------
// File backend
// ---------------------------------------------------------------------------

export const ENTITY_METADATA_FILE_NAME = 'entity-metadata.json';

const EntityStateSchema = z.object({
  lastSuccessAt: z.number().nullable(),
  consecutiveErrors: z.number().int().nonnegative(),
  lastErrorAt: z.number().nullable(),
  inCooldownUntil: z.number().nullable(),
});

const EntityMetadataFileSchema = z.object({
  version: z.literal(1),
  intervals: z.record(z.string(), z.record(z.string(), EntityStateSchema)),
});

type EntityMetadataFile = z.infer<typeof EntityMetadataFileSchema>;

export class FileEntityMetadataStore extends CachedEntityMetadataStore {
  readonly filePath: string;

  constructor(stateDir: string, policy: CooldownPolicy) {
    super(policy);
    this.filePath = path.join(stateDir, ENTITY_METADATA_FILE_NAME);
  }

  protected async readAll(): Promise<StoredEntityState[]> {
    const raw = await readJsonFile(this.filePath);
    if (raw === null) return [];
    const parsed = EntityMetadataFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Invalid entity metadata in ${this.filePath}: ${parsed.error.message}`, {
        path: this.filePath,
      });
    }
    const rows: StoredEntityState[] = [];
    for (const [interval, entities] of Object.entries(parsed.data.intervals)) {
      for (const [entity, state] of Object.entries(entities)) {
        rows.push({ entity, interval, state });
      }
    }
    return rows;
  }

  protected async persist(): Promise<void> {
    const file: EntityMetadataFile = { version: 1, intervals: {} };
    for (const { entity, interval, state } of this.allRecords()) {
      (file.intervals[interval] ??= {})[entity] = state;
    }
    await writeJsonAtomic(this.filePath, file);
  }
}
