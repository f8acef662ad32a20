/**
 * Process-lifetime memoization with at-most-once loading per key.
 *
 * Concurrent callers asking for a key that is still loading share the same
 * in-flight promise. Values are kept until the process exits; there is no
 * invalidation. A `shouldKeep` predicate lets callers refuse to memoize
 * degraded results so the next call loads again.
 */

export interface MemoOptions<V> {
  /** Return false to hand the value back without storing it. Default: always keep */
  shouldKeep?: (value: V) => boolean;
}

export interface MemoCache<K, V> {
  /** Return the memoized value for `key`, running `load` at most once while it is pending */
  get(key: K, load: () => Promise<V>): Promise<V>;
}

export const createMemoCache = <K, V>(options: MemoOptions<V> = {}): MemoCache<K, V> => {
  const shouldKeep = options.shouldKeep ?? (() => true);
  const settled = new Map<K, { value: V }>();
  const inFlight = new Map<K, Promise<V>>();

  return {
    get(key, load) {
      const hit = settled.get(key);
      if (hit !== undefined) {
        return Promise.resolve(hit.value);
      }

      const pending = inFlight.get(key);
      if (pending !== undefined) {
        return pending;
      }

      const promise = load()
        .then((value) => {
          if (shouldKeep(value)) {
            settled.set(key, { value });
          }
          return value;
        })
        .finally(() => {
          inFlight.delete(key);
        });

      inFlight.set(key, promise);
      return promise;
    },
  };
};

/**
 * Memoize a zero-argument async factory (database handle, geo reference, ...).
 */
export const once = <V>(
  load: () => Promise<V>,
  options: MemoOptions<V> = {}
): (() => Promise<V>) => {
  const cache = createMemoCache<'singleton', V>(options);
  return () => cache.get('singleton', load);
};
