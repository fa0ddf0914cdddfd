export async function mapWithConcurrency<TIn, TOut>(
  items: readonly TIn[],
  concurrency: number,
  fn: (item: TIn, index: number) => Promise<TOut>
): Promise<TOut[]> {
  if (!Number.isFinite(concurrency)) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  // NOTE: If you want best-effort behavior (partial progress), ensure `fn` handles
  // per-item errors internally. Unhandled rejections will fail the whole run.
  const max = Math.max(1, Math.floor(concurrency));
  const results: TOut[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) {
        return;
      }

      results[current] = await fn(items[current] as TIn, current);
    }
  }

  await Promise.all(Array.from({ length: Math.min(max, items.length) }, () => worker()));
  return results;
}

export type PacerClock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

const systemClock: PacerClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms))
};

/**
* Returns a gate that spaces successive callers at least `intervalMs` apart, across every
* worker sharing it. The first caller passes immediately.
*/
export function createPacer(intervalMs: number, clock: PacerClock = systemClock): () => Promise<void> {
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new Error(`Invalid pacing interval: ${intervalMs}`);
  }

  let nextSlot = Number.NEGATIVE_INFINITY;

  return async () => {
    const now = clock.now();
    // Reserve the slot synchronously so concurrent callers queue behind each other.
    const slot = Math.max(now, nextSlot);
    nextSlot = slot + intervalMs;

    const wait = slot - now;
    if (wait > 0) {
      await clock.sleep(wait);
    }
  };
}
