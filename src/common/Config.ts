import { InvalidConfigError } from './Errors';

export interface FilterParams {
  /** Bit-array length (m). */
  readonly numBits: number;
  /** Index-derivation rounds per item (k). */
  readonly numHashFunctions: number;
}

export interface SizingOptions {
  readonly expectedItems: number;
  readonly falsePositiveRate: number;
}

// Indices are derived in unsigned 32-bit space and serialized as u32.
export const MAX_NUM_BITS = 0xffffffff;

// Above any k the sizing formula yields for a representable error rate.
export const MAX_NUM_HASH_FUNCTIONS = 1024;

export const DEFAULT_SIZING_OPTIONS: SizingOptions = {
  expectedItems: 1000,
  falsePositiveRate: 0.01,
};

export function validateFilterParams(params: FilterParams): FilterParams {
  if (!Number.isInteger(params.numBits) || params.numBits <= 0) {
    throw new InvalidConfigError('numBits', `must be a positive integer, got ${params.numBits}`);
  }
  if (params.numBits > MAX_NUM_BITS) {
    throw new InvalidConfigError('numBits', `must be <= ${MAX_NUM_BITS}, got ${params.numBits}`);
  }
  if (!Number.isInteger(params.numHashFunctions) || params.numHashFunctions <= 0) {
    throw new InvalidConfigError(
      'numHashFunctions',
      `must be a positive integer, got ${params.numHashFunctions}`
    );
  }
  if (params.numHashFunctions > MAX_NUM_HASH_FUNCTIONS) {
    throw new InvalidConfigError(
      'numHashFunctions',
      `must be <= ${MAX_NUM_HASH_FUNCTIONS}, got ${params.numHashFunctions}`
    );
  }
  return params;
}

export function resolveSizingOptions(options?: Partial<SizingOptions>): SizingOptions {
  const resolved = { ...DEFAULT_SIZING_OPTIONS, ...options };

  if (!Number.isInteger(resolved.expectedItems) || resolved.expectedItems < 1) {
    throw new InvalidConfigError(
      'expectedItems',
      `must be a positive integer, got ${resolved.expectedItems}`
    );
  }
  if (!(resolved.falsePositiveRate > 0 && resolved.falsePositiveRate < 1)) {
    throw new InvalidConfigError(
      'falsePositiveRate',
      `must be between 0 and 1 (exclusive), got ${resolved.falsePositiveRate}`
    );
  }

  return resolved;
}
