import { Region } from './Region';

/**
 * Map keyed by region value rather than object identity.
 * Iterates in insertion order.
 */
export class RegionMap<V> implements Iterable<[Region, V]> {
  private readonly entries = new Map<number, [Region, V]>();

  constructor(entries?: Iterable<readonly [Region, V]>) {
    if (entries) {
      for (const [region, value] of entries) {
        this.set(region, value);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(region: Region): V | undefined {
    return this.entries.get(region.mask)?.[1];
  }

  has(region: Region): boolean {
    return this.entries.has(region.mask);
  }

  set(region: Region, value: V): this {
    this.entries.set(region.mask, [region, value]);
    return this;
  }

  *regions(): IterableIterator<Region> {
    for (const [region] of this.entries.values()) {
      yield region;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries.values()) {
      yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<[Region, V]> {
    return this.entries.values();
  }
}
