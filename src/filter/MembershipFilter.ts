import { FilterParams, validateFilterParams } from '../common/Config';
import { InvalidConfigError } from '../common/Errors';
import { FilterPlan, FilterSnapshot, FilterStats } from '../common/Types';
import { IndependentHashStrategy, deriveIndex, deriveIndices } from '../hashing/DoubleHashStrategy';
import { encodeItem } from '../hashing/HashFunctions';
import { IHashStrategy } from '../hashing/IHashStrategy';
import { estimateFalsePositiveRate } from '../sizing/FilterSizing';
import { FilterSerializer } from './FilterSerializer';
import { IMembershipFilter, MembershipFilterOptions } from './IMembershipFilter';

/**
 * Bloom filter over strings.
 *
 * Bits are packed eight per byte and are never cleared. Callers sharing an
 * instance must serialize add() themselves.
 */
export class MembershipFilter implements IMembershipFilter {
  public readonly numBits: number;
  public readonly numHashFunctions: number;

  private readonly bits: Uint8Array;
  private readonly hashStrategy: IHashStrategy;
  private inserted: number = 0;

  constructor(numBits: number, numHashFunctions: number, options: MembershipFilterOptions = {}) {
    validateFilterParams({ numBits, numHashFunctions });
    this.numBits = numBits;
    this.numHashFunctions = numHashFunctions;
    this.bits = new Uint8Array(Math.ceil(numBits / 8));
    this.hashStrategy = options.hashStrategy ?? IndependentHashStrategy.createDefault();
  }

  public static create(params: FilterParams, options?: MembershipFilterOptions): MembershipFilter {
    return new MembershipFilter(params.numBits, params.numHashFunctions, options);
  }

  public static fromPlan(plan: FilterPlan, options?: MembershipFilterOptions): MembershipFilter {
    return new MembershipFilter(plan.numBits, plan.numHashFunctions, options);
  }

  public static fromSnapshot(snapshot: FilterSnapshot, options?: MembershipFilterOptions): MembershipFilter {
    const filter = new MembershipFilter(snapshot.numBits, snapshot.numHashFunctions, options);
    if (snapshot.bits.length !== filter.bits.length) {
      throw new InvalidConfigError(
        'bits',
        `expected ${filter.bits.length} bytes for ${snapshot.numBits} bits, got ${snapshot.bits.length}`
      );
    }
    filter.bits.set(snapshot.bits);
    filter.inserted = snapshot.insertedCount;
    return filter;
  }

  public static fromBuffer(buffer: Buffer, options?: MembershipFilterOptions): MembershipFilter {
    return MembershipFilter.fromSnapshot(FilterSerializer.deserialize(buffer), options);
  }

  public get insertedCount(): number {
    return this.inserted;
  }

  public add(item: string): void {
    const [hash1, hash2] = this.hashStrategy.baseHashes(encodeItem(item));
    for (let i = 0; i < this.numHashFunctions; i++) {
      this.setBit(deriveIndex(hash1, hash2, i, this.numBits));
    }
    this.inserted++;
  }

  public addAll(items: Iterable<string>): number {
    let count = 0;
    for (const item of items) {
      this.add(item);
      count++;
    }
    return count;
  }

  public mightContain(item: string): boolean {
    const [hash1, hash2] = this.hashStrategy.baseHashes(encodeItem(item));
    for (let i = 0; i < this.numHashFunctions; i++) {
      if (!this.getBit(deriveIndex(hash1, hash2, i, this.numBits))) {
        return false;
      }
    }
    return true;
  }

  public indicesFor(item: string): number[] {
    const [hash1, hash2] = this.hashStrategy.baseHashes(encodeItem(item));
    return deriveIndices(hash1, hash2, this.numHashFunctions, this.numBits);
  }

  public countSetBits(): number {
    let count = 0;
    for (let i = 0; i < this.bits.length; i++) {
      let byte = this.bits[i];
      while (byte !== 0) {
        byte &= byte - 1;
        count++;
      }
    }
    return count;
  }

  public serialize(): Buffer {
    return FilterSerializer.serialize({
      numBits: this.numBits,
      numHashFunctions: this.numHashFunctions,
      insertedCount: this.inserted,
      bits: this.bits,
    });
  }

  public getStats(): FilterStats {
    const setBits = this.countSetBits();
    return {
      numBits: this.numBits,
      numHashFunctions: this.numHashFunctions,
      byteSize: this.bits.length,
      insertedCount: this.inserted,
      setBits,
      fillRatio: setBits / this.numBits,
      estimatedFalsePositiveRate: estimateFalsePositiveRate(
        this.numBits,
        this.numHashFunctions,
        this.inserted
      ),
    };
  }

  private setBit(index: number): void {
    this.bits[index >>> 3] |= 1 << (index & 7);
  }

  private getBit(index: number): boolean {
    return (this.bits[index >>> 3] & (1 << (index & 7))) !== 0;
  }
}
