import { isAbortError } from './errors.js';

export type Settled<R> = R | { error: unknown };

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results keep
 * input order; a worker that throws yields `{ error }` in its slot instead of
 * rejecting the whole map. Once `shouldStop` returns true no new item starts,
 * and the map waits for in-flight items before resolving. An error thrown by
 * `onSettled` or `shouldStop` rejects the map after in-flight items settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: Settled<R>, index: number, item: T) => void,
  shouldStop?: () => boolean,
): Promise<Array<Settled<R>>> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Number(concurrency) || 1));
  const results = new Array<Settled<R>>(list.length);
  let cursor = 0;
  let cancelled = false;

  const checkStop = (): boolean => {
    if (cancelled) return true;
    if (typeof shouldStop !== 'function') return false;
    const stop = shouldStop();
    if (stop) {
      cancelled = true;
      cursor = list.length;
    }
    return stop;
  };

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (checkStop()) break;
      const currentIndex = cursor;
      cursor += 1;
      try {
        results[currentIndex] = await worker(list[currentIndex], currentIndex);
      } catch (err: unknown) {
        results[currentIndex] = { error: err };
        if (isAbortError(err) && checkStop()) {
          break;
        }
      } finally {
        if (typeof onSettled === 'function') {
          onSettled(results[currentIndex], currentIndex, list[currentIndex]);
        }
      }
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  // Wait for every in-flight item so callers can read shared state without races.
  const outcomes = await Promise.allSettled(workers);
  for (const outcome of outcomes) {
    if (outcome.status === 'rejected') throw outcome.reason;
  }
  return results;
}
