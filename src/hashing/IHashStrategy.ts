export type BaseHashes = readonly [h1: number, h2: number];

/**
 * Produces the two base hashes that seed double hashing.
 *
 * Both values must be computed from the item bytes. A strategy that derives
 * h2 from h1 gives every pair of items colliding on h1 the same k indices,
 * so the filter behaves as if k were 1.
 */
export interface IHashStrategy {
  baseHashes(data: Uint8Array): BaseHashes;
}
