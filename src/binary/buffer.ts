type Pattern = Uint8Array | number[] | string;

function toBytes(pattern: Pattern): Uint8Array {
  if (typeof pattern === 'string') return fromAscii(pattern);
  return pattern instanceof Uint8Array ? pattern : new Uint8Array(pattern);
}

/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: Pattern): boolean {
  return matchesAt(data, 0, pattern);
}

/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(data: Uint8Array, offset: number, pattern: Pattern): boolean {
  const bytes = toBytes(pattern);
  if (offset < 0 || offset + bytes.length > data.length) {
    return false;
  }
  for (let i = 0; i < bytes.length; i++) {
    if (data[offset + i] !== bytes[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Find the first occurrence of a pattern at or after `from`
 */
export function indexOf(data: Uint8Array, pattern: Pattern, from = 0): number {
  const bytes = toBytes(pattern);
  for (let i = Math.max(0, from); i <= data.length - bytes.length; i++) {
    if (matchesAt(data, i, bytes)) return i;
  }
  return -1;
}

/**
 * Find the last occurrence of a pattern starting at or before `from`
 */
export function lastIndexOf(data: Uint8Array, pattern: Pattern, from = data.length): number {
  const bytes = toBytes(pattern);
  for (let i = Math.min(from, data.length - bytes.length); i >= 0; i--) {
    if (matchesAt(data, i, bytes)) return i;
  }
  return -1;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert a string to Uint8Array using ASCII encoding
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Convert a byte range to an ASCII string (safe for structure parsing only)
 */
export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = Math.min(length !== undefined ? offset + length : data.length, data.length);
  let result = '';
  for (let i = offset; i < end; i++) {
    result += String.fromCharCode(data[i]!);
  }
  return result;
}
