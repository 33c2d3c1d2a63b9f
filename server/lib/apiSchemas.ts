/**
 * Zod schemas for the bar provider's aggregate responses.
 *
 * The provider mixes short (`t`, `o`, `c`) and long (`timestamp`, `open`,
 * `close`) keys depending on endpoint, and wraps rows in `results`,
 * `historical`, or nothing at all.
 */

import { z } from 'zod';

import type { Bar } from './types.js';

// ---------------------------------------------------------------------------
// Aggregate bars  (v2/aggs/ticker/…)
// ---------------------------------------------------------------------------

const AggBarSchema = z.object({
  t: z.number().optional(), // timestamp (ms epoch)
  o: z.number().optional(),
  h: z.number().optional(),
  l: z.number().optional(),
  c: z.number().optional(),
  v: z.number().optional(),
  timestamp: z.number().optional(),
  time: z.number().optional(),
  open: z.number().optional(),
  high: z.number().optional(),
  low: z.number().optional(),
  close: z.number().optional(),
  volume: z.number().optional(),
});

type AggBar = z.infer<typeof AggBarSchema>;

export const AggregateResponseSchema = z.union([
  z.object({ results: z.array(AggBarSchema) }),
  z.object({ historical: z.array(AggBarSchema) }),
  z.array(AggBarSchema),
  // Empty ranges come back without a results key.
  z.object({ resultsCount: z.literal(0) }),
]);

export type AggregateResponse = z.infer<typeof AggregateResponseSchema>;

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/** Epoch seconds and milliseconds both occur; normalize to milliseconds. */
function toEpochMs(value: number): number {
  return value < 1e11 ? Math.floor(value * 1000) : Math.floor(value);
}

function toBar(row: AggBar): Bar | null {
  const time = row.t ?? row.timestamp ?? row.time;
  const close = row.c ?? row.close;
  if (time === undefined || close === undefined) return null;
  return {
    time: toEpochMs(time),
    open: row.o ?? row.open ?? close,
    high: row.h ?? row.high ?? close,
    low: row.l ?? row.low ?? close,
    close,
    volume: row.v ?? row.volume ?? 0,
  };
}

export type ParsedAggregate = { ok: true; bars: Bar[] } | { ok: false; reason: string };

/**
 * Validate a decoded payload and turn it into bars sorted by time. A row
 * without a timestamp or close makes the whole payload invalid.
 */
export function parseAggregateBars(payload: unknown): ParsedAggregate {
  const parsed = AggregateResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason: `response failed validation: ${issues}` };
  }

  const data = parsed.data;
  const rows: AggBar[] = Array.isArray(data)
    ? data
    : 'results' in data
      ? data.results
      : 'historical' in data
        ? data.historical
        : [];

  const bars: Bar[] = [];
  for (const [index, row] of rows.entries()) {
    const bar = toBar(row);
    if (!bar) return { ok: false, reason: `row ${index} has no timestamp or close` };
    bars.push(bar);
  }
  bars.sort((a, b) => a.time - b.time);
  return { ok: true, bars };
}
