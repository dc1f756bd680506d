/** The read-only side of a store that views walk. */
export interface ViewSource<K, V> {
  readonly filled: number;
  contains(key: K): boolean;
  peek(key: K): V;
  entries(): IterableIterator<[K, V]>;
}

/**
 * Base for the lazy views returned by `keys()`, `values()` and `items()`.
 *
 * A view holds no snapshot: each iteration walks the live store from least
 * to most recently used through `entries()`, which never touches recency.
 * Mutating the store while an iteration is in progress is not supported.
 */
abstract class StoreView<K, V, T> implements Iterable<T> {
  constructor(protected readonly store: ViewSource<K, V>) {}

  get size(): number {
    return this.store.filled;
  }

  abstract has(item: T): boolean;

  protected abstract project(key: K, value: V): T;

  *[Symbol.iterator](): IterableIterator<T> {
    for (const [key, value] of this.store.entries()) {
      yield this.project(key, value);
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }
}

export class KeysView<K> extends StoreView<K, unknown, K> {
  has(key: K): boolean {
    return this.store.contains(key);
  }

  protected project(key: K): K {
    return key;
  }
}

export class ValuesView<V> extends StoreView<unknown, V, V> {
  has(value: V): boolean {
    for (const candidate of this) {
      if (Object.is(candidate, value)) return true;
    }
    return false;
  }

  protected project(_key: unknown, value: V): V {
    return value;
  }
}

export class ItemsView<K, V> extends StoreView<K, V, [K, V]> {
  has([key, value]: readonly [K, V]): boolean {
    return this.store.contains(key) && Object.is(this.store.peek(key), value);
  }

  protected project(key: K, value: V): [K, V] {
    return [key, value];
  }
}
