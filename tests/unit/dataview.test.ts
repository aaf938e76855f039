import { describe, it, expect } from 'vitest';
import {
  readUint24BE,
  readUint32LE,
  writeUint32LE,
  readSyncsafe,
} from '../../src/binary/dataview.js';
import { CorruptedFileError } from '../../src/errors.js';

describe('readUint24BE', () => {
  it('should read big-endian uint24', () => {
    const data = new Uint8Array([0x01, 0x02, 0x03]);
    expect(readUint24BE(data, 0)).toBe(0x010203);
  });

  it('should throw on truncated data', () => {
    const data = new Uint8Array([0x01, 0x02]);
    expect(() => readUint24BE(data, 0)).toThrow(CorruptedFileError);
  });
});

describe('readUint32LE', () => {
  it('should read little-endian uint32', () => {
    const data = new Uint8Array([0x78, 0x56, 0x34, 0x12]);
    expect(readUint32LE(data, 0)).toBe(0x12345678);
  });

  it('should read values with the high bit set as unsigned', () => {
    const data = new Uint8Array([0x00, 0x00, 0x00, 0x80]);
    expect(readUint32LE(data, 0)).toBe(0x80000000);
  });

  it('should report how many bytes were missing', () => {
    const data = new Uint8Array([0x01, 0x02]);
    expect(() => readUint32LE(data, 0)).toThrow('Truncated data: needed 4 bytes but only 2 available at offset 0');
  });
});

describe('writeUint32LE', () => {
  it('should write little-endian uint32', () => {
    const data = new Uint8Array(4);
    writeUint32LE(data, 0, 0x12345678);
    expect(Array.from(data)).toEqual([0x78, 0x56, 0x34, 0x12]);
  });
});

describe('readSyncsafe', () => {
  it('should read 7 bits per byte', () => {
    const data = new Uint8Array([0x00, 0x00, 0x02, 0x01]);
    expect(readSyncsafe(data, 0)).toBe(257);
  });
});
