import { FilterStats } from '../common/Types';
import { IHashStrategy } from '../hashing/IHashStrategy';

export interface IMembershipFilter {
  add(item: string): void;
  /** false means the item was definitely never added. */
  mightContain(item: string): boolean;
  serialize(): Buffer;
  getStats(): FilterStats;
}

export interface MembershipFilterOptions {
  /** Defaults to seeded MurmurHash3 for h1 and FNV-1a for h2. */
  hashStrategy?: IHashStrategy;
}
