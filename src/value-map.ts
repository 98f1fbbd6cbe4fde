import { equals, hashValue } from "./equality.ts";
import type { Value } from "./value.ts";

export interface ReadonlyValueMap extends Iterable<readonly [Value, Value]> {
  readonly size: number;

  get(key: Value): Value | undefined;

  has(key: Value): boolean;

  keys(): IterableIterator<Value>;

  values(): IterableIterator<Value>;
}

interface Entry {
  readonly key: Value;
  value: Value;
}

/**
 * Map keyed by structural {@link Value} equality. Entries iterate in the order
 * their keys were first inserted; setting an existing key replaces its value
 * in place.
 */
export class ValueMap implements ReadonlyValueMap {
  private readonly buckets = new Map<number, Entry[]>();
  private readonly entries: Entry[] = [];

  public constructor(entries?: Iterable<readonly [Value, Value]>) {
    for (const [key, value] of entries ?? []) {
      this.set(key, value);
    }
  }

  public get size(): number {
    return this.entries.length;
  }

  public get(key: Value): Value | undefined {
    return this.find(key)?.value;
  }

  public has(key: Value): boolean {
    return this.find(key) !== undefined;
  }

  public set(key: Value, value: Value): this {
    const existing = this.find(key);
    if (existing) {
      existing.value = value;
      return this;
    }
    const entry: Entry = { key, value };
    const hash = hashValue(key);
    const bucket = this.buckets.get(hash);
    if (bucket) {
      bucket.push(entry);
    } else {
      this.buckets.set(hash, [entry]);
    }
    this.entries.push(entry);
    return this;
  }

  public *keys(): IterableIterator<Value> {
    for (const { key } of this.entries) {
      yield key;
    }
  }

  public *values(): IterableIterator<Value> {
    for (const { value } of this.entries) {
      yield value;
    }
  }

  public *[Symbol.iterator](): IterableIterator<readonly [Value, Value]> {
    for (const { key, value } of this.entries) {
      yield [key, value];
    }
  }

  private find(key: Value): Entry | undefined {
    return this.buckets.get(hashValue(key))?.find((it) => equals(it.key, key));
  }
}
