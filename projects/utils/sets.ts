export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * An immutable set of numbers kept in ascending order, so that two sets
 * with the same members iterate and hash identically.
 */
export class NumberSet implements ConstSet<number> {
  private readonly data: Set<number>;
  private readonly sorted: readonly number[];

  constructor(items: Iterable<number> = []) {
    this.data = new Set(items);
    this.sorted = [...this.data].sort((a, b) => a - b);
  }

  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.sorted[Symbol.iterator]();
  }

  has(a: number): boolean {
    return this.data.has(a);
  }

  equals(other: NumberSet): boolean {
    if (this.size != other.size) {
      return false;
    }
    for (const a of this.data) {
      if (!other.has(a)) {
        return false;
      }
    }
    return true;
  }

  toArray(): number[] {
    return [...this.sorted];
  }

  hash(): string {
    return `{${this.sorted.join(',')}}`;
  }
}

/**
 * A map whose keys are compared by a string hash rather than by identity.
 */
export class HashMap<K, V> {
  private hasher: (item: K) => string;
  private data: Map<string, [K, V]> = new Map();

  constructor(hasher: (item: K) => string) {
    this.hasher = hasher;
  }

  get size(): number {
    return this.data.size;
  }

  get(key: K): V | undefined {
    return this.data.get(this.hasher(key))?.[1];
  }

  has(key: K): boolean {
    return this.data.has(this.hasher(key));
  }

  set(key: K, value: V): this {
    this.data.set(this.hasher(key), [key, value]);
    return this;
  }

  entries(): IterableIterator<[K, V]> {
    return this.data.values();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}
