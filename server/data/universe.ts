import { promises as fs } from 'fs';
import { z } from 'zod';

import logger from '../logger.js';

/** Tickers to keep fresh, per interval, in priority tie-break order. */
export type TickerUniverse = Readonly<Record<string, readonly string[]>>;

const UniverseFileSchema = z.union([
  // Same tickers for every configured interval.
  z.object({ tickers: z.array(z.string()) }),
  // Explicit per-interval lists.
  z.object({ intervals: z.record(z.string(), z.array(z.string())) }),
]);

const TICKER_SYMBOL_PATTERN = /^[A-Z0-9][A-Z0-9.\-^=/]{0,19}$/;

export function normalizeTickerSymbol(raw: string): string {
  return String(raw || '')
    .trim()
    .toUpperCase();
}

export function isValidTickerSymbol(symbol: string): boolean {
  return TICKER_SYMBOL_PATTERN.test(symbol);
}

/** Upper-case, drop invalid symbols, drop duplicates keeping the first position. */
export function normalizeTickerList(raw: readonly string[]): { tickers: string[]; rejected: string[] } {
  const tickers: string[] = [];
  const rejected: string[] = [];
  const seen = new Set<string>();
  for (const entry of raw) {
    const symbol = normalizeTickerSymbol(entry);
    if (!isValidTickerSymbol(symbol)) {
      rejected.push(entry);
      continue;
    }
    if (seen.has(symbol)) continue;
    seen.add(symbol);
    tickers.push(symbol);
  }
  return { tickers, rejected };
}

/**
 * Resolve parsed universe JSON against the configured interval list.
 * Intervals missing from a per-interval file get an empty list; intervals in
 * the file that are not configured are ignored.
 */
export function buildTickerUniverse(raw: unknown, intervals: readonly string[]): TickerUniverse {
  const parsed = UniverseFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid universe file: ${parsed.error.message}`);
  }
  const source = parsed.data;
  const universe: Record<string, readonly string[]> = {};
  for (const interval of intervals) {
    const list = 'tickers' in source ? source.tickers : (source.intervals[interval] ?? []);
    const { tickers, rejected } = normalizeTickerList(list);
    if (rejected.length > 0) {
      logger.warn({ interval, rejected: rejected.slice(0, 20), rejectedCount: rejected.length }, '[universe] dropped invalid symbols');
    }
    universe[interval] = Object.freeze(tickers);
  }
  return Object.freeze(universe);
}

export async function loadTickerUniverse(filePath: string, intervals: readonly string[]): Promise<TickerUniverse> {
  const contents = await fs.readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (err: unknown) {
    throw new Error(`Universe file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return buildTickerUniverse(raw, intervals);
}

export function universeEntityCounts(universe: TickerUniverse, intervals: readonly string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const interval of intervals) {
    counts[interval] = universe[interval]?.length ?? 0;
  }
  return counts;
}
