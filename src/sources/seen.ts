/**
 * Number of consecutive polls a key may go unobserved before it is forgotten.
 */
export const DEFAULT_RETAIN_POLLS = 48;

/**
 * In-memory record of items already announced for one source. Nothing is
 * persisted: a restart starts from an empty registry.
 *
 * Every `partition` call counts as one poll. Keys the source stops returning
 * (last month's archive page, posts that fell out of a listing, articles past
 * a feed's window) are dropped after `retainPolls` polls without them, which
 * bounds the registry to what the source still shows plus that grace.
 */
export type SeenRegistry = {
  /** True once the registry has recorded its first batch. */
  readonly primed: boolean;
  readonly size: number;
  readonly has: (key: string) => boolean;
  readonly partition: <T>(
    items: ReadonlyArray<T>,
    keyOf: (item: T) => string,
  ) => SeenPartition<T>;
  readonly markSeen: (keys: Iterable<string>) => void;
};

export type SeenPartition<T> = {
  readonly fresh: ReadonlyArray<T>;
  readonly skippedCount: number;
};

export function createSeenRegistry(
  retainPolls: number = DEFAULT_RETAIN_POLLS,
): SeenRegistry {
  // key -> poll in which it was last observed
  const keys = new Map<string, number>();
  let poll = 0;
  let primed = false;

  function forgetStale(): void {
    for (const [key, lastObserved] of keys) {
      if (poll - lastObserved >= retainPolls) {
        keys.delete(key);
      }
    }
  }

  return {
    get primed() {
      return primed;
    },
    get size() {
      return keys.size;
    },
    has: (key) => keys.has(key),
    partition<T>(items: ReadonlyArray<T>, keyOf: (item: T) => string) {
      poll++;
      const fresh: Array<T> = [];
      let skippedCount = 0;
      for (const item of items) {
        const key = keyOf(item);
        if (keys.has(key)) {
          keys.set(key, poll);
          skippedCount++;
        } else {
          fresh.push(item);
        }
      }
      forgetStale();
      return { fresh, skippedCount };
    },
    markSeen(batch) {
      for (const key of batch) {
        keys.set(key, poll);
      }
      primed = true;
    },
  };
}
