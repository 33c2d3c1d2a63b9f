import type { FetchError } from './errors.js';
import type { TimeSeries } from './types.js';

export type FetchOutcome = { ok: true; series: TimeSeries } | { ok: false; error: FetchError };

/**
 * The provider boundary. Implementations must honour `signal`: the executor
 * aborts it when the per-fetch timeout elapses. Thrown errors are treated as
 * transient failures.
 */
export interface BarFetcher {
  fetchBars(entity: string, interval: string, since: number | null, signal: AbortSignal): Promise<FetchOutcome>;
}
