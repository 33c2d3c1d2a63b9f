import * as path from 'path';
import { z } from 'zod';

import { readJsonFile, writeJsonAtomic } from '../lib/atomicFile.js';
import { PersistenceError } from '../lib/errors.js';
import type { RateLimiterSnapshot } from '../lib/rateLimiter.js';

export const RATE_LIMITER_FILE_NAME = 'rate-limiter.json';

const RateLimiterFileSchema = z.object({
  version: z.literal(1),
  classes: z.record(
    z.string(),
    z.object({
      currentDelayMs: z.number().nonnegative(),
      recentErrorStreak: z.number().int().nonnegative(),
    }),
  ),
});

/** Learned limiter spacing, carried between runs so a restart does not hammer the provider. */
export class RateLimiterStateStore {
  readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, RATE_LIMITER_FILE_NAME);
  }

  async load(): Promise<RateLimiterSnapshot> {
    const raw = await readJsonFile(this.filePath);
    if (raw === null) return {};
    const parsed = RateLimiterFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Invalid rate limiter state in ${this.filePath}: ${parsed.error.message}`, {
        path: this.filePath,
      });
    }
    return parsed.data.classes;
  }

  async save(snapshot: RateLimiterSnapshot): Promise<void> {
    await writeJsonAtomic(this.filePath, { version: 1, classes: snapshot });
  }
}
