/**
 * Snapshot layout (big-endian):
 *   magic u32 | version u16 | numBits u32 | numHashFunctions u32 |
 *   insertedCount u32 | bits[ceil(numBits / 8)]
 */

import { MAX_NUM_HASH_FUNCTIONS } from '../common/Config';
import { CorruptFilterError } from '../common/Errors';
import { FilterSnapshot } from '../common/Types';

export const FILTER_MAGIC = 0x4d464c54;
export const FILTER_VERSION = 1;
export const FILTER_HEADER_SIZE = 4 + 2 + 4 + 4 + 4;

export class FilterSerializer {

  public static serialize(snapshot: FilterSnapshot): Buffer {
    const byteSize = Math.ceil(snapshot.numBits / 8);
    const buffer = Buffer.alloc(FILTER_HEADER_SIZE + byteSize);
    let offset = 0;

    buffer.writeUInt32BE(FILTER_MAGIC, offset);
    offset += 4;
    buffer.writeUInt16BE(FILTER_VERSION, offset);
    offset += 2;
    buffer.writeUInt32BE(snapshot.numBits, offset);
    offset += 4;
    buffer.writeUInt32BE(snapshot.numHashFunctions, offset);
    offset += 4;
    buffer.writeUInt32BE(Math.min(snapshot.insertedCount, 0xffffffff), offset);
    offset += 4;
    buffer.set(snapshot.bits.subarray(0, byteSize), offset);

    return buffer;
  }

  public static deserialize(buffer: Buffer): FilterSnapshot {
    if (buffer.length < FILTER_HEADER_SIZE) {
      throw new CorruptFilterError(
        `expected at least ${FILTER_HEADER_SIZE} header bytes, got ${buffer.length}`
      );
    }

    let offset = 0;
    const magic = buffer.readUInt32BE(offset);
    offset += 4;
    if (magic !== FILTER_MAGIC) {
      throw new CorruptFilterError(`bad magic 0x${magic.toString(16)}`);
    }

    const version = buffer.readUInt16BE(offset);
    offset += 2;
    if (version !== FILTER_VERSION) {
      throw new CorruptFilterError(`unsupported version ${version}`);
    }

    const numBits = buffer.readUInt32BE(offset);
    offset += 4;
    if (numBits === 0) {
      throw new CorruptFilterError('numBits is 0');
    }
    const numHashFunctions = buffer.readUInt32BE(offset);
    offset += 4;
    if (numHashFunctions === 0 || numHashFunctions > MAX_NUM_HASH_FUNCTIONS) {
      throw new CorruptFilterError(
        `numHashFunctions must be in [1, ${MAX_NUM_HASH_FUNCTIONS}], got ${numHashFunctions}`
      );
    }
    const insertedCount = buffer.readUInt32BE(offset);
    offset += 4;

    const byteSize = Math.ceil(numBits / 8);
    if (buffer.length - offset < byteSize) {
      throw new CorruptFilterError(
        `bit section truncated: expected ${byteSize} bytes, got ${buffer.length - offset}`
      );
    }
    const bits = new Uint8Array(buffer.subarray(offset, offset + byteSize));

    return { numBits, numHashFunctions, insertedCount, bits };
  }
}
