/**
 * 32-bit hash functions over raw item bytes.
 *
 * All functions return unsigned integers (`>>> 0`) so that the modulo in
 * index derivation never sees a negative value.
 */

export type HashFunction = (data: Uint8Array) => number;

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

const MURMUR_C1 = 0xcc9e2d51;
const MURMUR_C2 = 0x1b873593;

export function encodeItem(item: string): Uint8Array {
  return Buffer.from(item, 'utf8');
}

export function uint32Bytes(value: number): Uint8Array {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(value >>> 0, 0);
  return buffer;
}

export function fnv1a32(data: Uint8Array): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < data.length; i++) {
    hash ^= data[i];
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

function rotl32(value: number, shift: number): number {
  return (value << shift) | (value >>> (32 - shift));
}

function mixBlock(block: number): number {
  let k = Math.imul(block, MURMUR_C1);
  k = rotl32(k, 15);
  return Math.imul(k, MURMUR_C2);
}

/**
 * MurmurHash3, x86 32-bit variant.
 */
export function murmur3_32(data: Uint8Array, seed: number = 0): number {
  let hash = seed >>> 0;
  const length = data.length;
  const blockCount = length >>> 2;

  for (let i = 0; i < blockCount; i++) {
    const offset = i * 4;
    const block =
      data[offset] |
      (data[offset + 1] << 8) |
      (data[offset + 2] << 16) |
      (data[offset + 3] << 24);

    hash ^= mixBlock(block);
    hash = rotl32(hash, 13);
    hash = (Math.imul(hash, 5) + 0xe6546b64) | 0;
  }

  const tailOffset = blockCount * 4;
  const tailLength = length & 3;
  let tail = 0;
  if (tailLength >= 3) {
    tail ^= data[tailOffset + 2] << 16;
  }
  if (tailLength >= 2) {
    tail ^= data[tailOffset + 1] << 8;
  }
  if (tailLength >= 1) {
    tail ^= data[tailOffset];
    hash ^= mixBlock(tail);
  }

  hash ^= length;
  hash ^= hash >>> 16;
  hash = Math.imul(hash, 0x85ebca6b);
  hash ^= hash >>> 13;
  hash = Math.imul(hash, 0xc2b2ae35);
  hash ^= hash >>> 16;

  return hash >>> 0;
}

export function seededMurmur3(seed: number): HashFunction {
  return (data) => murmur3_32(data, seed);
}
