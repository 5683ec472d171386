export type { IHashStrategy, BaseHashes } from './IHashStrategy';
export type { HashFunction } from './HashFunctions';
export type { IndependentHashStrategyOptions } from './DoubleHashStrategy';

export {
  encodeItem,
  fnv1a32,
  murmur3_32,
  seededMurmur3,
  uint32Bytes,
} from './HashFunctions';

export {
  IndependentHashStrategy,
  deriveIndex,
  deriveIndices,
} from './DoubleHashStrategy';
