import type { DateWindow, SensorKind } from './types';

export interface SeriesKey {
  stationId: string;
  sensorKind: SensorKind;
  window: DateWindow;
}

export function seriesCacheKey({ stationId, sensorKind, window }: SeriesKey): string {
  return [stationId, sensorKind, window.begin, window.end].join('|');
}

/**
 * Session-scoped cache. Entries never expire on their own; they live until
 * `clear()` or `delete()` is called.
 */
export class SessionCache<K, V> {
  protected readonly entries = new Map<string, V>();

  constructor(private readonly keyOf: (key: K) => string) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(this.keyOf(key));
  }

  get(key: K): V | undefined {
    return this.entries.get(this.keyOf(key));
  }

  // Insert-if-absent: `create` only runs when the key is missing
  getOrCreate(key: K, create: () => V): V {
    const id = this.keyOf(key);
    if (this.entries.has(id)) {
      const existing = this.entries.get(id);
      if (existing !== undefined) return existing;
    }
    const value = create();
    this.entries.set(id, value);
    return value;
  }

  delete(key: K): boolean {
    return this.entries.delete(this.keyOf(key));
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Cache of in-flight and settled loads. The pending promise is stored before
 * the loader starts, so concurrent callers for the same key share one load.
 * Rejected loads are evicted so the next call retries.
 */
export class AsyncSessionCache<K, V> extends SessionCache<K, Promise<V>> {
  getOrLoad(key: K, load: () => Promise<V>): Promise<V> {
    return this.getOrCreate(key, () => {
      const pending: Promise<V> = Promise.resolve()
        .then(load)
        .catch((error: unknown) => {
          if (this.get(key) === pending) this.delete(key);
          throw error;
        });
      return pending;
    });
  }
}
