/**
 * Core scheduling types shared by the stores, the executor and the strategies.
 *
 * Timestamps are epoch milliseconds. `null` means "never happened".
 */

/** One (ticker, interval) pair eligible for a fetch attempt within a pass. */
export interface WorkItem {
  readonly entity: string;
  readonly interval: string;
}

/** Per-ticker, per-interval bookkeeping owned by the entity metadata store. */
export interface EntityState {
  lastSuccessAt: number | null;
  consecutiveErrors: number;
  lastErrorAt: number | null;
  inCooldownUntil: number | null;
}

export type EntityHealth = 'healthy' | 'degraded' | 'cooldown';

/** A single OHLCV bar. `time` is the bar open in epoch milliseconds. */
export interface Bar {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface TimeSeries {
  entity: string;
  interval: string;
  bars: Bar[];
}

export function workItemKey(item: WorkItem): string {
  return `${item.interval}::${item.entity}`;
}

export function emptyEntityState(): EntityState {
  return {
    lastSuccessAt: null,
    consecutiveErrors: 0,
    lastErrorAt: null,
    inCooldownUntil: null,
  };
}
