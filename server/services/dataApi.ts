/**
 * Data API HTTP client: the production BarFetcher.
 *
 * Builds aggregate-range URLs, performs the request through a circuit
 * breaker, and classifies every way a request can go wrong into a
 * FetchError kind. Never throws from fetchBars; the executor sees a
 * FetchOutcome either way.
 */

import { parseAggregateBars } from '../lib/apiSchemas.js';
import type { BarFetcher, FetchOutcome } from '../lib/barFetcher.js';
import { CircuitBreaker, CircuitOpenError, type CircuitState } from '../lib/circuitBreaker.js';
import { FetchError, errorMessage, isAbortError, type FetchErrorKind } from '../lib/errors.js';
import type { Bar } from '../lib/types.js';
import baseLogger, { type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Aggregate / interval config
// ---------------------------------------------------------------------------

const DATA_API_AGG_INTERVAL_MAP: Record<string, { multiplier: number; timespan: string; lookbackDays: number }> = {
  '1min': { multiplier: 1, timespan: 'minute', lookbackDays: 5 },
  '5min': { multiplier: 5, timespan: 'minute', lookbackDays: 15 },
  '15min': { multiplier: 15, timespan: 'minute', lookbackDays: 30 },
  '30min': { multiplier: 30, timespan: 'minute', lookbackDays: 60 },
  '1hour': { multiplier: 1, timespan: 'hour', lookbackDays: 120 },
  '4hour': { multiplier: 4, timespan: 'hour', lookbackDays: 365 },
  '1day': { multiplier: 1, timespan: 'day', lookbackDays: 730 },
  '1week': { multiplier: 1, timespan: 'week', lookbackDays: 1825 },
};

const DAY_MS = 24 * 60 * 60 * 1000;
const RATE_LIMIT_MESSAGE_PATTERN = /Limit Reach|Too Many Requests|rate limit/i;

export function getDataApiAggConfig(interval: string): { multiplier: number; timespan: string; lookbackDays: number } | null {
  return DATA_API_AGG_INTERVAL_MAP[String(interval || '').trim()] ?? null;
}

function formatDateUTC(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildDataApiUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | boolean | undefined | null> = {},
): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function sanitizeDataApiUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.searchParams.has('apiKey')) parsed.searchParams.set('apiKey', '***');
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * Range URL for one ticker. With `since` the range starts on that UTC day;
 * without it the interval's lookback window is used.
 */
export function buildAggregateRangeUrl(
  baseUrl: string,
  symbol: string,
  interval: string,
  since: number | null,
  now: number,
): string | null {
  const config = getDataApiAggConfig(interval);
  if (!config) return null;
  const from = formatDateUTC(since ?? now - config.lookbackDays * DAY_MS);
  const to = formatDateUTC(now);
  return buildDataApiUrl(
    baseUrl,
    `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/${config.multiplier}/${config.timespan}/${from}/${to}`,
    { adjusted: 'true', sort: 'asc', limit: 50000 },
  );
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

/** HTTP status → FetchError kind. */
export function classifyHttpStatus(status: number, body = ''): FetchErrorKind {
  if (status === 429 || RATE_LIMIT_MESSAGE_PATTERN.test(body)) return 'rate-limited';
  if (status === 404) return 'not-found';
  if (status >= 500) return 'transient';
  // 401/403 are account problems, not the ticker's.
  if (status === 401 || status === 403) return 'transient';
  return 'malformed';
}

function extractDataApiError(payload: unknown): string | null {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) return null;
  const fields = new Map(Object.entries(payload));
  if (String(fields.get('status') ?? '').toUpperCase() === 'ERROR') {
    return String(fields.get('error') ?? fields.get('message') ?? 'DataAPI returned ERROR status').trim();
  }
  for (const key of ['error', 'Error Message', 'Note']) {
    const value = fields.get(key);
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

/** Outage signals trip the breaker; throttling and ticker-level answers do not. */
function isInfrastructureError(err: unknown): boolean {
  if (err instanceof FetchError) return err.kind === 'transient';
  return true;
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export interface DataApiBarFetcherOptions {
  baseUrl: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
  clock?: () => number;
  breaker?: CircuitBreaker;
  logger?: Logger;
}

export class DataApiBarFetcher implements BarFetcher {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => number;
  private readonly breaker: CircuitBreaker;
  private readonly log: Logger;

  constructor(options: DataApiBarFetcherOptions) {
    if (!options.baseUrl) {
      throw new Error('DATA_API_BASE_URL is not configured');
    }
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? baseLogger;
    this.breaker =
      options.breaker ??
      new CircuitBreaker({
        failureThreshold: 5,
        cooldownMs: 30_000,
        isInfraError: isInfrastructureError,
        clock: this.clock,
        onStateChange: (from, to) => this.logBreakerTransition(from, to),
      });
  }

  get circuitState(): CircuitState {
    return this.breaker.getState();
  }

  async fetchBars(entity: string, interval: string, since: number | null, signal: AbortSignal): Promise<FetchOutcome> {
    const label = `DataAPI ${interval} ${entity}`;
    const url = buildAggregateRangeUrl(this.baseUrl, entity, interval, since, this.clock());
    if (!url) {
      return { ok: false, error: new FetchError('not-found', `${label}: unsupported interval`) };
    }

    try {
      const bars = await this.breaker.call(() => this.requestBars(url, label, signal));
      return { ok: true, series: { entity, interval, bars } };
    } catch (err: unknown) {
      if (err instanceof FetchError) return { ok: false, error: err };
      if (err instanceof CircuitOpenError) {
        return { ok: false, error: new FetchError('transient', `${label}: ${err.message}`, { cause: err }) };
      }
      if (isAbortError(err)) {
        return { ok: false, error: new FetchError('transient', `${label} request aborted`, { cause: err }) };
      }
      this.log.warn({ url: sanitizeDataApiUrl(url), error: errorMessage(err) }, '[dataApi] request failed');
      return { ok: false, error: new FetchError('transient', `${label} request failed: ${errorMessage(err)}`, { cause: err }) };
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async requestBars(url: string, label: string, signal: AbortSignal): Promise<Bar[]> {
    const requestUrl = new URL(url);
    if (this.apiKey && !requestUrl.searchParams.has('apiKey')) {
      requestUrl.searchParams.set('apiKey', this.apiKey);
    }
    const resp = await this.fetchImpl(requestUrl.toString(), { signal });
    const text = await resp.text();
    let payload: unknown = null;
    let parseFailure: string | null = null;
    if (text.trim()) {
      try {
        payload = JSON.parse(text);
      } catch (err: unknown) {
        parseFailure = errorMessage(err);
      }
    }
    const apiError = extractDataApiError(payload);

    if (!resp.ok) {
      const details = apiError || text.trim().slice(0, 180) || `HTTP ${resp.status}`;
      throw new FetchError(classifyHttpStatus(resp.status, details), `${label} request failed (${resp.status}): ${details}`, {
        httpStatus: resp.status,
      });
    }
    if (apiError) {
      const kind: FetchErrorKind = RATE_LIMIT_MESSAGE_PATTERN.test(apiError) ? 'rate-limited' : 'malformed';
      throw new FetchError(kind, `${label} API error: ${apiError}`, { httpStatus: resp.status });
    }
    if (parseFailure !== null) {
      throw new FetchError('malformed', `${label} returned invalid JSON: ${parseFailure}`, { httpStatus: resp.status });
    }

    const parsed = parseAggregateBars(payload);
    if (!parsed.ok) {
      throw new FetchError('malformed', `${label} ${parsed.reason}`, { httpStatus: resp.status });
    }
    return parsed.bars;
  }

  private logBreakerTransition(from: CircuitState, to: CircuitState): void {
    if (to === 'OPEN') {
      this.log.error({ from, to }, '[circuit-breaker] data-api opened; provider calls blocked');
    } else if (to === 'HALF_OPEN') {
      this.log.warn({ from, to }, '[circuit-breaker] data-api probing recovery');
    } else {
      this.log.info({ from, to }, '[circuit-breaker] data-api closed; provider calls resumed');
    }
  }
}
