// results are kept for as long as the key object is alive
export function memoize<K extends object, T>(
  f: (key: K) => T,
): (key: K) => T {
  const cache = new WeakMap<K, { result: T }>();
  return (key: K): T => {
    const entry = cache.get(key);
    if (entry) {
      return entry.result;
    }
    const result = f(key);
    cache.set(key, { result });
    return result;
  };
}
