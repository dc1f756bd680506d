import { inspect } from "node:util";
import {
  EmptyStoreError,
  InvalidCapacityError,
  KeyNotFoundError,
} from "./errors";
import { ItemsView, KeysView, ValuesView } from "./views";

export type EntryInput<K, V> = Iterable<readonly [K, V]>;

export type ValueEquality<V> = (a: V, b: V) => boolean;

type LruNode<K, V> = {
  key: K;
  value: V;
  older: LruNode<K, V> | null;
  newer: LruNode<K, V> | null;
};

export interface LRUStoreJSON<K, V> {
  capacity: number;
  entries: Array<[K, V]>;
}

/**
 * Fixed-capacity key-value store that evicts the least recently used entry
 * once it overflows.
 *
 * Reads and writes move a key to the most recently used position. `peek`,
 * `contains` and every traversal (`keys()`, `values()`, `items()`, `entries()`)
 * leave the recency order alone.
 *
 * Entries live in a Map for lookup and in a doubly linked list for recency,
 * oldest at `head`, newest at `tail`, so every reorder is O(1).
 */
export class LRUStore<K, V> implements Iterable<K> {
  private _capacity: number;
  private readonly table = new Map<K, LruNode<K, V>>();
  private head: LruNode<K, V> | null = null;
  private tail: LruNode<K, V> | null = null;

  constructor(capacity: number, initial?: EntryInput<K, V>) {
    assertCapacity(capacity);
    this._capacity = capacity;
    if (initial !== undefined) {
      this.update(initial);
    }
  }

  /** Configured capacity. Only `resize` changes it. */
  get capacity(): number {
    return this._capacity;
  }

  /** Number of entries currently held. */
  get filled(): number {
    return this.table.size;
  }

  get leastRecentlyUsed(): K {
    if (!this.head) {
      throw new EmptyStoreError("leastRecentlyUsed");
    }
    return this.head.key;
  }

  get mostRecentlyUsed(): K {
    if (!this.tail) {
      throw new EmptyStoreError("mostRecentlyUsed");
    }
    return this.tail.key;
  }

  /**
   * Insert or replace a value. The key becomes the most recently used entry
   * and, if that overflows the store, the oldest entry is evicted.
   */
  write(key: K, value: V): this {
    const existing = this.table.get(key);
    if (existing) {
      existing.value = value;
      this.moveToNewest(existing);
      return this;
    }

    const node: LruNode<K, V> = { key, value, older: null, newer: null };
    this.table.set(key, node);
    this.append(node);
    if (this.head && this.table.size > this._capacity) {
      this.remove(this.head);
    }
    return this;
  }

  /** Return a value and make its key the most recently used. */
  read(key: K): V {
    const node = this.table.get(key);
    if (!node) {
      throw new KeyNotFoundError(key);
    }
    this.moveToNewest(node);
    return node.value;
  }

  /** Return a value without affecting access order. */
  peek(key: K): V {
    const node = this.table.get(key);
    if (!node) {
      throw new KeyNotFoundError(key);
    }
    return node.value;
  }

  get(key: K): V | undefined;
  get<D>(key: K, fallback: D): V | D;
  get<D>(key: K, fallback?: D): V | D | undefined {
    const node = this.table.get(key);
    if (!node) return fallback;
    this.moveToNewest(node);
    return node.value;
  }

  contains(key: K): boolean {
    return this.table.has(key);
  }

  delete(key: K): void {
    const node = this.table.get(key);
    if (!node) {
      throw new KeyNotFoundError(key);
    }
    this.remove(node);
  }

  pop(key: K): V;
  pop<D>(key: K, fallback: D): V | D;
  pop<D>(key: K, ...fallback: [D?]): V | D | undefined {
    const node = this.table.get(key);
    if (!node) {
      if (fallback.length > 0) return fallback[0];
      throw new KeyNotFoundError(key);
    }
    this.remove(node);
    return node.value;
  }

  /** Remove and return the least recently used entry. */
  popLeastRecent(): [K, V] {
    const oldest = this.head;
    if (!oldest) {
      throw new EmptyStoreError("leastRecentlyUsed");
    }
    this.remove(oldest);
    return [oldest.key, oldest.value];
  }

  /**
   * Read `key` if present, otherwise write `value` under it. Either way the
   * key ends up most recently used.
   */
  setDefault(key: K, value: V): V {
    const node = this.table.get(key);
    if (node) {
      this.moveToNewest(node);
      return node.value;
    }
    this.write(key, value);
    return value;
  }

  /** Write every pair in iteration order, evicting as sequential writes would. */
  update(entries: EntryInput<K, V>): this {
    for (const [key, value] of entries) {
      this.write(key, value);
    }
    return this;
  }

  clear(): void {
    this.table.clear();
    this.head = null;
    this.tail = null;
  }

  /**
   * Change the capacity. Shrinking below the current fill drops the oldest
   * entries in a single pass; survivors keep their relative order.
   */
  resize(capacity: number): void {
    assertCapacity(capacity);
    this._capacity = capacity;

    let excess = this.table.size - capacity;
    if (excess <= 0) return;

    // Walk to the oldest survivor, then cut everything before it off at once.
    let survivor = this.head;
    while (survivor && excess > 0) {
      this.table.delete(survivor.key);
      survivor = survivor.newer;
      excess--;
    }
    if (survivor) {
      survivor.older = null;
    }
    this.head = survivor;
  }

  /** Entries from least to most recently used, without touching recency. */
  *entries(): IterableIterator<[K, V]> {
    for (let node = this.head; node; node = node.newer) {
      yield [node.key, node.value];
    }
  }

  keys(): KeysView<K> {
    return new KeysView(this);
  }

  values(): ValuesView<V> {
    return new ValuesView(this);
  }

  items(): ItemsView<K, V> {
    return new ItemsView(this);
  }

  *[Symbol.iterator](): IterableIterator<K> {
    for (let node = this.head; node; node = node.newer) {
      yield node.key;
    }
  }

  /**
   * Stores are equal when capacity, fill and every entry in recency order
   * match. Anything that is not an LRUStore is never equal.
   */
  equals(other: unknown, isEqualValue: ValueEquality<V> = Object.is): boolean {
    if (!(other instanceof LRUStore)) return false;
    if (other === this) return true;
    if (
      this._capacity !== other.capacity ||
      this.table.size !== other.filled
    ) {
      return false;
    }

    const theirs: Iterator<[unknown, V]> = other.entries();
    for (let node = this.head; node; node = node.newer) {
      const next = theirs.next();
      if (next.done) return false;
      const [otherKey, otherValue] = next.value;
      if (
        !sameValueZero(node.key, otherKey) ||
        !isEqualValue(node.value, otherValue)
      ) {
        return false;
      }
    }
    return true;
  }

  toJSON(): LRUStoreJSON<K, V> {
    return { capacity: this._capacity, entries: Array.from(this.entries()) };
  }

  toString(): string {
    return `<LRUStore capacity=${this._capacity} filled=${this.table.size}>`;
  }

  [inspect.custom](): string {
    return this.toString();
  }

  private moveToNewest(node: LruNode<K, V>): void {
    if (this.tail === node) return;
    this.unlink(node);
    this.append(node);
  }

  private append(node: LruNode<K, V>): void {
    node.newer = null;
    node.older = this.tail;
    if (this.tail) {
      this.tail.newer = node;
    }
    this.tail = node;
    if (!this.head) {
      this.head = node;
    }
  }

  private remove(node: LruNode<K, V>): void {
    this.unlink(node);
    this.table.delete(node.key);
  }

  private unlink(node: LruNode<K, V>): void {
    if (node.older) {
      node.older.newer = node.newer;
    } else {
      this.head = node.newer;
    }

    if (node.newer) {
      node.newer.older = node.older;
    } else {
      this.tail = node.older;
    }

    node.older = null;
    node.newer = null;
  }
}

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new InvalidCapacityError(capacity);
  }
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}
