import { describe, it, expect } from 'vitest';
import { Region, RegionMap, MAX_OUTCOMES } from '../../core/regions';
import { InvalidInputError } from '../../core/errors';

describe('Region', () => {
  describe('construction', () => {
    it('should store outcomes in ascending order without duplicates', () => {
      const region = Region.of(2, 0, 2);

      expect(region.outcomes).toEqual([0, 2]);
      expect(region.mask).toBe(5);
      expect(region.cardinality).toBe(2);
    });

    it('should round-trip through the bitmask', () => {
      expect(Region.fromMask(11).outcomes).toEqual([0, 1, 3]);
      expect(Region.fromMask(11).equals(Region.of(3, 1, 0))).toBe(true);
    });

    it('should build the empty and full regions', () => {
      expect(Region.empty().outcomes).toEqual([]);
      expect(Region.empty().isEmpty).toBe(true);
      expect(Region.full(4).outcomes).toEqual([0, 1, 2, 3]);
      expect(Region.full(0).equals(Region.empty())).toBe(true);
    });

    it('should reject invalid outcomes and masks', () => {
      expect(() => Region.of(-1)).toThrow(InvalidInputError);
      expect(() => Region.of(1.5)).toThrow(InvalidInputError);
      expect(() => Region.of(MAX_OUTCOMES)).toThrow(InvalidInputError);
      expect(() => Region.fromMask(-1)).toThrow(InvalidInputError);
      expect(() => Region.fromMask(2 ** MAX_OUTCOMES)).toThrow(InvalidInputError);
      expect(() => Region.full(MAX_OUTCOMES + 1)).toThrow(InvalidInputError);
    });
  });

  describe('set operations', () => {
    it('should test membership', () => {
      const region = Region.of(1, 3);
      expect(region.has(1)).toBe(true);
      expect(region.has(2)).toBe(false);
      expect(region.has(-1)).toBe(false);
    });

    it('should test subsets', () => {
      expect(Region.of(1).isSubsetOf(Region.of(0, 1))).toBe(true);
      expect(Region.empty().isSubsetOf(Region.of(2))).toBe(true);
      expect(Region.of(0, 2).isSubsetOf(Region.of(0, 1))).toBe(false);
    });

    it('should take unions', () => {
      expect(Region.of(0, 2).union(Region.of(1, 2)).outcomes).toEqual([0, 1, 2]);
    });

    it('should report the span of the largest outcome', () => {
      expect(Region.empty().span).toBe(0);
      expect(Region.of(0, 4).span).toBe(5);
    });
  });

  describe('equality and order', () => {
    it('should compare by value', () => {
      expect(Region.of(0, 1).equals(Region.of(1, 0))).toBe(true);
      expect(Region.of(0, 1).equals(Region.of(0))).toBe(false);
    });

    it('should order by bitmask', () => {
      const sorted = [Region.of(2), Region.of(0, 1), Region.empty(), Region.of(0)].sort((a, b) =>
        a.compare(b)
      );
      expect(sorted.map((r) => r.toString())).toEqual(['()', '(0)', '(0, 1)', '(2)']);
    });
  });

  describe('formatting', () => {
    it('should print the ascending index sequence', () => {
      expect(Region.empty().toString()).toBe('()');
      expect(Region.of(0).toString()).toBe('(0)');
      expect(Region.of(1, 0).toString()).toBe('(0, 1)');
    });

    it('should expose a key and JSON form', () => {
      expect(Region.of(2, 0).key).toBe('0,2');
      expect(JSON.stringify({ region: Region.of(2, 0) })).toBe('{"region":[0,2]}');
    });
  });
});

describe('RegionMap', () => {
  it('should look up by region value', () => {
    const map = new RegionMap<string>();
    map.set(Region.of(0, 1), 'a');

    expect(map.get(Region.of(1, 0))).toBe('a');
    expect(map.has(Region.of(0, 1))).toBe(true);
    expect(map.get(Region.of(0))).toBeUndefined();
    expect(map.size).toBe(1);
  });

  it('should overwrite entries for equal regions', () => {
    const map = new RegionMap<number>([
      [Region.of(1), 1],
      [Region.of(1), 2],
    ]);

    expect(map.size).toBe(1);
    expect(map.get(Region.of(1))).toBe(2);
  });

  it('should iterate in insertion order', () => {
    const map = new RegionMap<boolean>([
      [Region.of(2), true],
      [Region.empty(), false],
    ]);

    expect([...map.regions()].map((r) => r.toString())).toEqual(['(2)', '()']);
    expect([...map.values()]).toEqual([true, false]);
    expect([...map].map(([r, v]) => `${r}:${v}`)).toEqual(['(2):true', '():false']);
  });
});
