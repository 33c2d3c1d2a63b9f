/**
 * Adaptive Rate Limiter — computes the minimum spacing between consecutive
 * fetches for each interval class. The provider does not publish its limits,
 * so the spacing is learned from outcomes:
 *
 *   failure → delay × backoffFactor, capped at maxDelayMs
 *   success → delay × decayFactor, floored at minDelayMs
 *
 * The limiter never sleeps. Callers ask how long to wait and do the waiting.
 */

export interface RateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  /** Multiplier applied on failure. Must be > 1. */
  backoffFactor: number;
  /** Multiplier applied on success. Must be in (0, 1). */
  decayFactor: number;
  /** Starting delay for classes with no restored state. Defaults to minDelayMs. */
  initialDelayMs?: number;
}

export interface RateLimiterClassState {
  currentDelayMs: number;
  recentErrorStreak: number;
}

export type RateLimiterSnapshot = Record<string, RateLimiterClassState>;

interface ClassEntry extends RateLimiterClassState {
  lastAttemptAt: number | null;
}

export class AdaptiveRateLimiter {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly backoffFactor: number;
  private readonly decayFactor: number;
  private readonly initialDelayMs: number;
  private readonly classes = new Map<string, ClassEntry>();

  constructor(options: RateLimiterOptions, initialState: RateLimiterSnapshot = {}) {
    this.minDelayMs = Math.max(0, options.minDelayMs);
    this.maxDelayMs = Math.max(this.minDelayMs, options.maxDelayMs);
    this.backoffFactor = Math.max(1.01, options.backoffFactor);
    this.decayFactor = Math.min(0.99, Math.max(0.01, options.decayFactor));
    this.initialDelayMs = this.clamp(options.initialDelayMs ?? this.minDelayMs);

    for (const [intervalClass, state] of Object.entries(initialState)) {
      this.classes.set(intervalClass, {
        currentDelayMs: this.clamp(state.currentDelayMs),
        recentErrorStreak: Math.max(0, Math.floor(state.recentErrorStreak)),
        lastAttemptAt: null,
      });
    }
  }

  /** Currently mandated spacing between consecutive attempts for the class. */
  delayFor(intervalClass: string): number {
    return this.entry(intervalClass).currentDelayMs;
  }

  recentErrorStreak(intervalClass: string): number {
    return this.entry(intervalClass).recentErrorStreak;
  }

  recordOutcome(intervalClass: string, success: boolean): void {
    const entry = this.entry(intervalClass);
    if (success) {
      entry.recentErrorStreak = 0;
      entry.currentDelayMs = this.clamp(entry.currentDelayMs * this.decayFactor);
      return;
    }
    entry.recentErrorStreak += 1;
    // A zero floor would never grow under multiplication alone.
    const base = Math.max(entry.currentDelayMs, 1);
    entry.currentDelayMs = this.clamp(base * this.backoffFactor);
  }

  /** Note that an attempt for the class started at `at`. */
  markAttempt(intervalClass: string, at: number): void {
    this.entry(intervalClass).lastAttemptAt = at;
  }

  /** Milliseconds left before the next attempt for the class may start. */
  remainingWait(intervalClass: string, now: number): number {
    const entry = this.entry(intervalClass);
    if (entry.lastAttemptAt === null) return 0;
    return Math.max(0, entry.lastAttemptAt + entry.currentDelayMs - now);
  }

  /** Overwrite one class's delay and streak, e.g. to fold back a worker's private limiter. */
  setState(intervalClass: string, state: RateLimiterClassState): void {
    const entry = this.entry(intervalClass);
    entry.currentDelayMs = this.clamp(state.currentDelayMs);
    entry.recentErrorStreak = Math.max(0, Math.floor(state.recentErrorStreak));
  }

  exportState(): RateLimiterSnapshot {
    const snapshot: RateLimiterSnapshot = {};
    for (const [intervalClass, entry] of this.classes) {
      snapshot[intervalClass] = {
        currentDelayMs: entry.currentDelayMs,
        recentErrorStreak: entry.recentErrorStreak,
      };
    }
    return snapshot;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private entry(intervalClass: string): ClassEntry {
    let entry = this.classes.get(intervalClass);
    if (!entry) {
      entry = { currentDelayMs: this.initialDelayMs, recentErrorStreak: 0, lastAttemptAt: null };
      this.classes.set(intervalClass, entry);
    }
    return entry;
  }

  private clamp(delayMs: number): number {
    const numeric = Number.isFinite(delayMs) ? delayMs : this.maxDelayMs;
    return Math.min(this.maxDelayMs, Math.max(this.minDelayMs, numeric));
  }
}
