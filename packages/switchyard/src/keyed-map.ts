/**
 * Map keyed by host values under a custom Equality
 *
 * Buckets by hash, then confirms with `equals`, so a weak hash only costs
 * lookups and never merges distinct keys. Iteration follows the order in which
 * hash buckets were first created.
 */

import type { Equality } from './equality.js';

interface Slot<K, V> {
  key: K;
  value: V;
}

export class KeyedMap<K, V> {
  private buckets = new Map<string, Slot<K, V>[]>();
  private count = 0;

  constructor(private readonly equality: Equality<K>) {}

  get size(): number {
    return this.count;
  }

  get(key: K): V | undefined {
    return this.findSlot(key)?.value;
  }

  has(key: K): boolean {
    return this.findSlot(key) !== undefined;
  }

  set(key: K, value: V): void {
    const slot = this.findSlot(key);
    if (slot) {
      slot.value = value;
      return;
    }

    const hash = this.equality.hash(key);
    const bucket = this.buckets.get(hash) ?? [];
    bucket.push({ key, value });
    this.buckets.set(hash, bucket);
    this.count++;
  }

  /**
   * Get the value for a key, creating it with `init` when missing
   */
  ensure(key: K, init: () => V): V {
    const slot = this.findSlot(key);
    if (slot) {
      return slot.value;
    }
    const value = init();
    this.set(key, value);
    return value;
  }

  delete(key: K): boolean {
    const hash = this.equality.hash(key);
    const bucket = this.buckets.get(hash);
    if (!bucket) {
      return false;
    }

    const index = bucket.findIndex((slot) => this.equality.equals(slot.key, key));
    if (index === -1) {
      return false;
    }

    bucket.splice(index, 1);
    if (bucket.length === 0) {
      this.buckets.delete(hash);
    }
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const bucket of this.buckets.values()) {
      for (const slot of bucket) {
        yield [slot.key, slot.value];
      }
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  private findSlot(key: K): Slot<K, V> | undefined {
    const bucket = this.buckets.get(this.equality.hash(key));
    return bucket?.find((slot) => this.equality.equals(slot.key, key));
  }
}
