import { CancelledRunError } from '@/lib/errors';
import { ResultSlots } from './slots';

export type PoolWorker<T, R> = (item: T, index: number, signal: AbortSignal) => Promise<R>;

/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results
 * come back in input order. The first failure stops scheduling, aborts the
 * calls still running and rejects with that failure; partial results are
 * discarded. An external abort rejects with CancelledRunError.
 */
export function mapPool<T, R>(items: readonly T[], limit: number, worker: PoolWorker<T, R>, signal?: AbortSignal): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    return Promise.reject(new RangeError(`concurrency must be a positive integer (got ${limit})`));
  }
  if (signal?.aborted) {
    return Promise.reject(new CancelledRunError());
  }
  if (items.length === 0) {
    return Promise.resolve([]);
  }

  const slots = new ResultSlots<R>(items.length);
  const inner = new AbortController();

  return new Promise<R[]>((resolve, reject) => {
    let next = 0;
    let running = 0;
    let settled = false;

    const onOuterAbort = () => finish(new CancelledRunError());
    signal?.addEventListener('abort', onOuterAbort, { once: true });

    function finish(error?: unknown) {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onOuterAbort);
      if (error !== undefined) {
        slots.discard();
        inner.abort();
        reject(signal?.aborted ? new CancelledRunError() : error);
        return;
      }
      resolve(slots.toArray());
    }

    function launch() {
      while (!settled && running < limit && next < items.length) {
        const index = next++;
        running++;
        worker(items[index], index, inner.signal)
          .then((value) => {
            running--;
            if (settled) return;
            slots.set(index, value);
            if (slots.complete) {
              finish();
            } else {
              launch();
            }
          })
          .catch(finish);
      }
    }

    launch();
  });
}
