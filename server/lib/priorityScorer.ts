import { isInCooldown } from './entityState.js';
import type { EntityState, WorkItem } from './types.js';

/**
 * Order one interval's tickers stalest-first.
 *
 * Tickers whose cooldown ends strictly after `now` are left out entirely.
 * Never-fetched tickers come first; the rest ascend by last success. Ties keep
 * input order, so identical metadata always yields the same sequence.
 */
export function scoreWorkItems(
  entities: readonly string[],
  interval: string,
  snapshot: ReadonlyMap<string, EntityState>,
  now: number,
): WorkItem[] {
  const seen = new Set<string>();
  const candidates: Array<{ entity: string; lastSuccessAt: number; position: number }> = [];

  entities.forEach((entity, position) => {
    if (seen.has(entity)) return;
    seen.add(entity);
    const state = snapshot.get(entity);
    if (state && isInCooldown(state, now)) return;
    candidates.push({
      entity,
      lastSuccessAt: state?.lastSuccessAt ?? Number.NEGATIVE_INFINITY,
      position,
    });
  });

  candidates.sort((a, b) => {
    if (a.lastSuccessAt !== b.lastSuccessAt) return a.lastSuccessAt < b.lastSuccessAt ? -1 : 1;
    return a.position - b.position;
  });

  return candidates.map(({ entity }) => ({ entity, interval }));
}
