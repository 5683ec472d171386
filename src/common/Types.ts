/**
 * Shared result shapes for the filter and its sizing planner.
 */

export interface FilterPlan {
  readonly expectedItems: number;
  /** Absent when m and k were given explicitly. */
  readonly falsePositiveRate?: number;
  readonly numBits: number;
  readonly numHashFunctions: number;
  readonly byteSize: number;
  /** Rate predicted for the derived m and k once expectedItems are inserted. */
  readonly estimatedFalsePositiveRate: number;
}

export interface FilterStats {
  readonly numBits: number;
  readonly numHashFunctions: number;
  readonly byteSize: number;
  readonly insertedCount: number;
  readonly setBits: number;
  readonly fillRatio: number;
  readonly estimatedFalsePositiveRate: number;
}

export interface FilterSnapshot {
  readonly numBits: number;
  readonly numHashFunctions: number;
  readonly insertedCount: number;
  readonly bits: Uint8Array;
}
