import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { isNotFoundError, readJsonFile, writeJsonAtomic } from '../lib/atomicFile.js';
import { ActivePassExistsError, PersistenceError, errorMessage } from '../lib/errors.js';
import { SerialQueue } from '../lib/serialQueue.js';
import { workItemKey, type WorkItem } from '../lib/types.js';

/**
 * Snapshot of one pass: what is still pending (in order) and what has been
 * attempted. `pending ∪ attempted` is always the set scored at pass start.
 */
export interface ProgressCursor {
  readonly passId: string;
  readonly interval: string;
  readonly createdAt: number;
  readonly pending: readonly WorkItem[];
  readonly attempted: readonly WorkItem[];
}

const WorkItemSchema = z.object({
  entity: z.string().min(1),
  interval: z.string().min(1),
});

const CursorFileSchema = z.object({
  version: z.literal(1),
  passId: z.string().min(1),
  interval: z.string().min(1),
  createdAt: z.number(),
  pending: z.array(WorkItemSchema),
  attempted: z.array(WorkItemSchema),
});

const PASS_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export function assertValidPassId(passId: string): void {
  if (!PASS_ID_PATTERN.test(passId)) {
    throw new Error(`Invalid pass id "${passId}"`);
  }
}

/** Pass identifier used by every strategy for an interval's cursor. */
export function passIdForInterval(interval: string): string {
  return `pass-${interval}`;
}

/**
 * Durable cursors, one JSON file per active pass under `<stateDir>/progress`.
 * Completed passes move to `progress/archive`. All writes go through one
 * serialized writer and are atomic, so the on-disk cursor is always the last
 * committed one.
 */
export class ProgressStateStore {
  readonly progressDir: string;
  readonly archiveDir: string;
  private readonly writer = new SerialQueue();
  private readonly clock: () => number;

  constructor(stateDir: string, options: { clock?: () => number } = {}) {
    this.progressDir = path.join(stateDir, 'progress');
    this.archiveDir = path.join(this.progressDir, 'archive');
    this.clock = options.clock ?? Date.now;
  }

  cursorPath(passId: string): string {
    assertValidPassId(passId);
    return path.join(this.progressDir, `${passId}.json`);
  }

  /**
   * Persist a fresh cursor for `items`. Fails with ActivePassExistsError when
   * an incomplete cursor for the same pass is already on disk.
   */
  startPass(passId: string, interval: string, items: readonly WorkItem[]): Promise<ProgressCursor> {
    return this.writer.run(async () => {
      const existing = await this.readCursor(passId);
      if (existing) throw new ActivePassExistsError(passId);

      const seen = new Set<string>();
      const pending: WorkItem[] = [];
      for (const item of items) {
        const key = workItemKey(item);
        if (seen.has(key)) continue;
        seen.add(key);
        pending.push({ entity: item.entity, interval: item.interval });
      }
      const cursor: ProgressCursor = { passId, interval, createdAt: this.clock(), pending, attempted: [] };
      await this.writeCursor(cursor);
      return cursor;
    });
  }

  /** The persisted cursor for `passId` exactly as last committed, or null. */
  resumePass(passId: string): Promise<ProgressCursor | null> {
    return this.writer.run(() => this.readCursor(passId));
  }

  /**
   * Move `item` from pending to attempted and commit the cursor before
   * resolving. The caller proceeds to the next item only after this resolves.
   */
  markAttempted(cursor: ProgressCursor, item: WorkItem): Promise<ProgressCursor> {
    return this.writer.run(async () => {
      const key = workItemKey(item);
      const index = cursor.pending.findIndex((candidate) => workItemKey(candidate) === key);
      if (index === -1) {
        throw new Error(`Work item ${key} is not pending in pass ${cursor.passId}`);
      }
      const next: ProgressCursor = {
        ...cursor,
        pending: [...cursor.pending.slice(0, index), ...cursor.pending.slice(index + 1)],
        attempted: [...cursor.attempted, cursor.pending[index]],
      };
      await this.writeCursor(next);
      return next;
    });
  }

  /** Archive the cursor and remove it from the active set. Pending must be empty. */
  completePass(cursor: ProgressCursor): Promise<string> {
    return this.writer.run(async () => {
      if (cursor.pending.length > 0) {
        throw new Error(`Pass ${cursor.passId} still has ${cursor.pending.length} pending item(s)`);
      }
      const source = this.cursorPath(cursor.passId);
      const target = path.join(this.archiveDir, `${cursor.passId}-${this.clock()}.json`);
      try {
        await fs.mkdir(this.archiveDir, { recursive: true });
        await fs.rename(source, target);
      } catch (err: unknown) {
        throw new PersistenceError(`Failed to archive pass ${cursor.passId}: ${errorMessage(err)}`, {
          path: source,
          cause: err,
        });
      }
      return target;
    });
  }

  /** Pass ids with a cursor on disk, sorted. */
  listActivePasses(): Promise<string[]> {
    return this.writer.run(async () => {
      let names: string[];
      try {
        names = await fs.readdir(this.progressDir);
      } catch (err: unknown) {
        if (isNotFoundError(err)) return [];
        throw new PersistenceError(`Failed to list ${this.progressDir}: ${errorMessage(err)}`, {
          path: this.progressDir,
          cause: err,
        });
      }
      return names
        .filter((name) => name.endsWith('.json') && !name.startsWith('.'))
        .map((name) => name.slice(0, -'.json'.length))
        .filter((passId) => PASS_ID_PATTERN.test(passId))
        .sort();
    });
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async readCursor(passId: string): Promise<ProgressCursor | null> {
    const filePath = this.cursorPath(passId);
    const raw = await readJsonFile(filePath);
    if (raw === null) return null;
    const parsed = CursorFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Invalid progress cursor in ${filePath}: ${parsed.error.message}`, { path: filePath });
    }
    const { version: _version, ...cursor } = parsed.data;
    if (cursor.passId !== passId) {
      throw new PersistenceError(`Cursor ${filePath} belongs to pass ${cursor.passId}`, { path: filePath });
    }
    return cursor;
  }

  private async writeCursor(cursor: ProgressCursor): Promise<void> {
    await writeJsonAtomic(this.cursorPath(cursor.passId), { version: 1, ...cursor });
  }
}
