import { CorruptedFileError } from '../errors.js';

function ensure(data: Uint8Array, offset: number, size: number): void {
  if (offset < 0 || offset + size > data.length) {
    throw new CorruptedFileError(
      `Truncated data: needed ${size} bytes but only ${Math.max(0, data.length - offset)} available`,
      offset,
    );
  }
}

/**
 * Read an unsigned 24-bit integer (big-endian)
 */
export function readUint24BE(data: Uint8Array, offset: number): number {
  ensure(data, offset, 3);
  return (data[offset]! << 16) | (data[offset + 1]! << 8) | data[offset + 2]!;
}

/**
 * Read an unsigned 32-bit integer (little-endian)
 */
export function readUint32LE(data: Uint8Array, offset: number): number {
  ensure(data, offset, 4);
  return (
    data[offset]! +
    (data[offset + 1]! << 8) +
    (data[offset + 2]! << 16) +
    ((data[offset + 3]! << 24) >>> 0)
  );
}

/**
 * Write an unsigned 32-bit integer (little-endian)
 */
export function writeUint32LE(data: Uint8Array, offset: number, value: number): void {
  ensure(data, offset, 4);
  data[offset] = value & 0xff;
  data[offset + 1] = (value >> 8) & 0xff;
  data[offset + 2] = (value >> 16) & 0xff;
  data[offset + 3] = (value >>> 24) & 0xff;
}

/**
 * Read a 28-bit ID3v2 "syncsafe" integer (7 bits per byte, big-endian)
 */
export function readSyncsafe(data: Uint8Array, offset: number): number {
  ensure(data, offset, 4);
  return (
    ((data[offset]! & 0x7f) << 21) |
    ((data[offset + 1]! & 0x7f) << 14) |
    ((data[offset + 2]! & 0x7f) << 7) |
    (data[offset + 3]! & 0x7f)
  );
}
