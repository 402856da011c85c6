/**
 * Bounded worker pool.
 *
 * `limit` workers pull items from a shared cursor until the list is drained or
 * the signal fires. Items never handed to a worker are returned so the caller
 * can report them.
 */

export type PoolResult<T> = {
  /** Items that were never started because the signal fired. */
  notStarted: T[];
};

export async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolResult<T>> {
  let cursor = 0;
  const size = Math.max(1, Math.min(limit, items.length));

  const next = async (): Promise<void> => {
    while (cursor < items.length) {
      if (signal?.aborted) return;
      const item = items[cursor++];
      await worker(item);
    }
  };

  await Promise.all(Array.from({ length: size }, () => next()));

  return { notStarted: items.slice(cursor) };
}

export type CombinedSignal = {
  signal: AbortSignal;
  /** Detach the listeners added to the input signals. */
  dispose: () => void;
};

/**
 * Combine multiple AbortSignals into one that aborts when any of them fires.
 */
export function anySignal(signals: readonly AbortSignal[]): CombinedSignal {
  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const dispose = () => {
    for (const remove of detach.splice(0)) remove();
  };

  for (const signal of signals) {
    if (signal.aborted) {
      dispose();
      controller.abort(signal.reason);
      return { signal: controller.signal, dispose };
    }
    const onAbort = () => {
      dispose();
      controller.abort(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    detach.push(() => signal.removeEventListener("abort", onAbort));
  }
  return { signal: controller.signal, dispose };
}
