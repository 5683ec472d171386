/**
 * Unit tests for base-hash strategies and double-hashing index derivation
 */

import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '../../src/common/Errors';
import { IndependentHashStrategy, deriveIndex, deriveIndices } from '../../src/hashing/DoubleHashStrategy';
import { HashFunction, encodeItem, fnv1a32, murmur3_32, uint32Bytes } from '../../src/hashing/HashFunctions';
import { BaseHashes, IHashStrategy } from '../../src/hashing/IHashStrategy';
import { MembershipFilter } from '../../src/filter/MembershipFilter';

// Collides for every pair of inputs with the same byte length.
const lengthHash: HashFunction = (data) => data.length;

/**
 * The defect under test: h2 computed from h1 instead of from the item.
 */
class RehashedStrategy implements IHashStrategy {
  public baseHashes(data: Uint8Array): BaseHashes {
    const h1 = lengthHash(data);
    return [h1, fnv1a32(uint32Bytes(h1))];
  }
}

describe('deriveIndex', () => {
  it('should combine base hashes linearly', () => {
    expect(deriveIndex(5, 3, 0, 100)).toBe(5);
    expect(deriveIndex(5, 3, 1, 100)).toBe(8);
    expect(deriveIndex(5, 3, 4, 100)).toBe(17);
    expect(deriveIndex(5, 3, 40, 100)).toBe(25);
  });

  it('should wrap at 2^32 before reducing modulo m', () => {
    // 0xffffffff + 2 wraps to 1
    expect(deriveIndex(0xffffffff, 2, 1, 1000)).toBe(1);
    expect(deriveIndex(0x80000000, 0x80000000, 1, 1024)).toBe(0);
  });

  it('should never return a negative index for large unsigned hashes', () => {
    const indices = deriveIndices(0xfffffff0, 0xdeadbeef, 16, 10);
    for (const index of indices) {
      expect(index).toBeGreaterThanOrEqual(0);
      expect(index).toBeLessThan(10);
    }
  });

  it('should derive k indices', () => {
    expect(deriveIndices(1, 10, 4, 16)).toEqual([1, 11, 5, 15]);
  });
});

describe('IndependentHashStrategy', () => {
  it('should use murmur3 for h1 and fnv1a for h2 by default', () => {
    const data = encodeItem('membership');
    const [h1, h2] = IndependentHashStrategy.createDefault().baseHashes(data);
    expect(h1).toBe(murmur3_32(data, 0));
    expect(h2).toBe(fnv1a32(data));
  });

  it('should seed h1 when asked', () => {
    const data = encodeItem('membership');
    const [h1] = IndependentHashStrategy.createDefault({ seed: 99 }).baseHashes(data);
    expect(h1).toBe(murmur3_32(data, 99));
  });

  it('should reject the same function for both hashes', () => {
    expect(() => new IndependentHashStrategy(fnv1a32, fnv1a32)).toThrow(InvalidConfigError);
  });

  it('should reject two functions that agree on every probe', () => {
    const copy: HashFunction = (data) => fnv1a32(data);
    expect(() => new IndependentHashStrategy(fnv1a32, copy)).toThrow(/identical output/);
  });

  it('should return unsigned base hashes from signed hash functions', () => {
    const signed: HashFunction = () => -1;
    const [h1, h2] = new IndependentHashStrategy(signed, fnv1a32).baseHashes(encodeItem('x'));
    expect(h1).toBe(0xffffffff);
    expect(h2).toBe(fnv1a32(encodeItem('x')));
  });
});

describe('independence of h1 and h2', () => {
  const a = 'a';
  const b = 'b';

  it('uses inputs that collide on h1', () => {
    expect(lengthHash(encodeItem(a))).toBe(lengthHash(encodeItem(b)));
  });

  it('gives colliding inputs identical indices when h2 is derived from h1', () => {
    const filter = new MembershipFilter(1024, 7, { hashStrategy: new RehashedStrategy() });
    const indicesA = filter.indicesFor(a);
    const indicesB = filter.indicesFor(b);

    expect(indicesA).toHaveLength(7);
    expect(indicesA).toEqual(indicesB);

    filter.add(a);
    expect(filter.mightContain(b)).toBe(true);
  });

  it('separates colliding inputs after the first round when h2 hashes the item', () => {
    const filter = new MembershipFilter(1024, 7, {
      hashStrategy: new IndependentHashStrategy(lengthHash, fnv1a32),
    });
    const indicesA = filter.indicesFor(a);
    const indicesB = filter.indicesFor(b);

    expect(indicesA[0]).toBe(indicesB[0]);
    for (let i = 1; i < 7; i++) {
      expect(indicesA[i]).not.toBe(indicesB[i]);
    }
    expect(indicesA).toEqual([1, 301, 601, 901, 177, 477, 777]);
    expect(indicesB).toEqual([1, 486, 971, 432, 917, 378, 863]);

    filter.add(a);
    expect(filter.mightContain(b)).toBe(false);
  });
});
