import { InvalidConfigError } from '../common/Errors';
import { BaseHashes, IHashStrategy } from './IHashStrategy';
import { HashFunction, encodeItem, fnv1a32, seededMurmur3 } from './HashFunctions';

const INDEPENDENCE_PROBES: readonly Uint8Array[] = [
  '',
  'a',
  'b',
  'filter',
  'membership',
  '0123456789',
].map(encodeItem);

export interface IndependentHashStrategyOptions {
  seed?: number;
}

export class IndependentHashStrategy implements IHashStrategy {
  private readonly primary: HashFunction;
  private readonly secondary: HashFunction;

  constructor(primary: HashFunction, secondary: HashFunction) {
    IndependentHashStrategy.assertIndependent(primary, secondary);
    this.primary = primary;
    this.secondary = secondary;
  }

  /**
   * MurmurHash3 (seeded) for h1 and FNV-1a for h2.
   */
  public static createDefault(options: IndependentHashStrategyOptions = {}): IndependentHashStrategy {
    return new IndependentHashStrategy(seededMurmur3(options.seed ?? 0), fnv1a32);
  }

  public baseHashes(data: Uint8Array): BaseHashes {
    return [this.primary(data) >>> 0, this.secondary(data) >>> 0];
  }

  private static assertIndependent(primary: HashFunction, secondary: HashFunction): void {
    if (primary === secondary) {
      throw new InvalidConfigError('hashStrategy', 'h1 and h2 must be different hash functions');
    }

    const agreesEverywhere = INDEPENDENCE_PROBES.every(
      (probe) => primary(probe) >>> 0 === secondary(probe) >>> 0
    );
    if (agreesEverywhere) {
      throw new InvalidConfigError(
        'hashStrategy',
        'h1 and h2 produce identical output on every probe input'
      );
    }
  }
}

// Double hashing: index_i = (h1 + i * h2) mod 2^32 mod m
export function deriveIndex(h1: number, h2: number, round: number, numBits: number): number {
  const combined = (h1 + Math.imul(round, h2)) >>> 0;
  return combined % numBits;
}

export function deriveIndices(
  h1: number,
  h2: number,
  numHashFunctions: number,
  numBits: number
): number[] {
  const indices: number[] = new Array(numHashFunctions);
  for (let i = 0; i < numHashFunctions; i++) {
    indices[i] = deriveIndex(h1, h2, i, numBits);
  }
  return indices;
}
