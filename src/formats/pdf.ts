/**
 * PDF metadata rewriter.
 *
 * Two metadata stores are cleared:
 *
 *  1. The Document Information Dictionary (the trailer's /Info object) with
 *     /Title, /Author, /Subject, /Keywords, /Creator, /Producer,
 *     /CreationDate, /ModDate.
 *  2. XMP metadata streams (/Type /Metadata or /Subtype /XML objects).
 *
 * Every string in the Info dictionary is overwritten with spaces (literal
 * strings) or zeros (hex strings) of the same length, and XMP stream bytes
 * with spaces, so no byte offset moves and the cross-reference table stays
 * valid.
 *
 * The trailer is found through `startxref`, so both classic `trailer`
 * sections and PDF 1.5 cross-reference streams are read. Encrypted
 * documents are reported, not modified. An Info dictionary stored inside a
 * compressed object stream cannot be blanked in place and is reported as
 * unreachable.
 */

import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import { FILE_SIGNATURES } from '../signatures.js';

export interface PdfStripResult {
  data: Uint8Array;
  /** Metadata stores that were blanked. */
  removed: string[];
  encrypted: boolean;
  /** The trailer names an Info dictionary that is not a plain object in the file. */
  infoUnreachable: boolean;
}

const HEADER_SCAN = 8192;
const TRAILER_SCAN = 2048;

const SPACE = 0x20;
const ZERO = 0x30;

// ─── Blanking ────────────────────────────────────────────────────────────────

/**
 * Overwrite the contents of every literal string `( … )` in [start, end)
 * with spaces, respecting nesting and backslash escapes.
 */
function blankLiteralStrings(data: Uint8Array, start: number, end: number): void {
  let i = start;
  while (i < end) {
    if (data[i] !== 0x28 /* ( */) {
      i++;
      continue;
    }
    let depth = 1;
    i++;
    while (i < end && depth > 0) {
      const c = data[i]!;
      if (c === 0x5c /* \ */) {
        data[i] = SPACE;
        if (i + 1 < end) data[i + 1] = SPACE;
        i += 2;
        continue;
      }
      if (c === 0x28) depth++;
      else if (c === 0x29 /* ) */) depth--;
      if (depth > 0) data[i] = SPACE;
      i++;
    }
  }
}

/**
 * Overwrite the digits of every hex string `< … >` in [start, end) with
 * zeros. Dictionary delimiters `<<` are skipped.
 */
function blankHexStrings(data: Uint8Array, start: number, end: number): void {
  let i = start;
  while (i < end) {
    if (data[i] === 0x3c /* < */ && data[i + 1] === 0x3c) {
      i += 2;
      continue;
    }
    if (data[i] !== 0x3c) {
      i++;
      continue;
    }
    i++;
    while (i < end && data[i] !== 0x3e /* > */) {
      const c = data[i]!;
      if ((c >= 0x30 && c <= 0x39) || (c >= 0x41 && c <= 0x46) || (c >= 0x61 && c <= 0x66)) {
        data[i] = ZERO;
      }
      i++;
    }
  }
}

// ─── Structure ───────────────────────────────────────────────────────────────

interface ObjectRef {
  objectNum: number;
  generation: number;
}

const XREF_STREAM_MARKERS = ['/Type /XRef', '/Type/XRef'];

/**
 * Dictionary text of the object starting at `offset`, up to its `stream`
 * keyword or `endobj`.
 */
function objectDictionary(data: Uint8Array, offset: number): string {
  const text = buffer.toAscii(data, offset, TRAILER_SCAN);
  const end = text.search(/\bstream\b|\bendobj\b/);
  return end === -1 ? text : text.slice(0, end);
}

/**
 * Text of the newest trailer dictionary: the one after the `xref` section
 * that `startxref` points at, or the dictionary of the cross-reference
 * stream there. Falls back to the last `trailer` keyword, then to the last
 * cross-reference stream, when `startxref` is missing or wrong.
 */
function findTrailer(data: Uint8Array): string | null {
  const startxref = buffer.lastIndexOf(data, 'startxref');
  if (startxref !== -1) {
    const m = /^startxref\s+(\d+)/.exec(buffer.toAscii(data, startxref, 64));
    const offset = m ? Number(m[1]) : -1;
    if (offset >= 0 && offset < data.length) {
      const section = buffer.toAscii(data, offset, 32);
      if (section.startsWith('xref')) {
        const trailer = buffer.indexOf(data, 'trailer', offset);
        if (trailer !== -1) return buffer.toAscii(data, trailer, TRAILER_SCAN);
      } else if (/^\d+\s+\d+\s+obj\b/.test(section)) {
        return objectDictionary(data, offset);
      }
    }
  }

  const trailer = buffer.lastIndexOf(data, 'trailer');
  if (trailer !== -1) return buffer.toAscii(data, trailer, TRAILER_SCAN);

  let xref = -1;
  for (const marker of XREF_STREAM_MARKERS) {
    xref = Math.max(xref, buffer.lastIndexOf(data, marker));
  }
  if (xref === -1) return null;
  const lookBehind = Math.max(0, xref - 512);
  const region = buffer.toAscii(data, lookBehind, xref - lookBehind);
  const header = /\d+\s+\d+\s+obj\b/g;
  let last = -1;
  for (let m = header.exec(region); m; m = header.exec(region)) last = m.index;
  return objectDictionary(data, last === -1 ? xref : lookBehind + last);
}

function findInfoRef(trailer: string): ObjectRef | null {
  const m = /\/Info\s+(\d+)\s+(\d+)\s+R/.exec(trailer);
  return m ? { objectNum: Number(m[1]), generation: Number(m[2]) } : null;
}

function isObjectStart(data: Uint8Array, pos: number): boolean {
  if (pos === 0) return true;
  const before = data[pos - 1];
  return before === 0x0a || before === 0x0d || before === SPACE;
}

/**
 * Byte range `[start, end)` of `N G obj … endobj`, or null.
 */
function findObjectRange(data: Uint8Array, ref: ObjectRef): [number, number] | null {
  const marker = `${ref.objectNum} ${ref.generation} obj`;
  let from = 0;
  for (;;) {
    const pos = buffer.indexOf(data, marker, from);
    if (pos === -1) return null;
    if (isObjectStart(data, pos)) {
      const endobj = buffer.indexOf(data, 'endobj', pos + marker.length);
      if (endobj !== -1) return [pos, endobj + 'endobj'.length];
    }
    from = pos + 1;
  }
}

const XMP_MARKERS = ['/Type /Metadata', '/Type/Metadata', '/Subtype /XML', '/Subtype/XML'];

/**
 * Stream-content ranges of every XMP metadata object.
 */
function findXmpStreams(data: Uint8Array): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  const seen = new Set<number>();

  for (const marker of XMP_MARKERS) {
    let from = 0;
    for (;;) {
      const pos = buffer.indexOf(data, marker, from);
      if (pos === -1) break;
      from = pos + 1;

      // Walk back to the nearest "N G obj" that is still open.
      const lookBehind = Math.max(0, pos - 512);
      const region = buffer.toAscii(data, lookBehind, pos - lookBehind);
      const header = /\d+\s+\d+\s+obj\b/g;
      let last = -1;
      for (let m = header.exec(region); m; m = header.exec(region)) last = m.index;
      if (last === -1 || region.includes('endobj', last)) continue;
      const objectStart = lookBehind + last;
      if (seen.has(objectStart)) continue;
      seen.add(objectStart);

      const keyword = buffer.indexOf(data, 'stream', pos);
      if (keyword === -1) continue;
      let start = keyword + 'stream'.length;
      if (data[start] === 0x0d) start++;
      if (data[start] === 0x0a) start++;

      const end = buffer.indexOf(data, 'endstream', start);
      if (end === -1) continue;
      ranges.push([start, end]);
    }
  }

  return ranges;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function isPdf(data: Uint8Array): boolean {
  return buffer.startsWith(data, FILE_SIGNATURES.PDF);
}

/**
 * Blank the Info dictionary and XMP streams of a PDF. The input is not
 * modified; `data` in the result is a copy.
 */
export function stripPdfMetadata(input: Uint8Array): PdfStripResult {
  if (!isPdf(input)) {
    throw new CorruptedFileError('Not a PDF: missing %PDF- header');
  }

  const data = new Uint8Array(input);
  const removed: string[] = [];

  const trailer = findTrailer(input);
  if (trailer === null) {
    throw new CorruptedFileError('No trailer dictionary found');
  }

  const encrypt = /\/Encrypt\s+\d+\s+\d+\s+R/;
  if (encrypt.test(buffer.toAscii(input, 0, HEADER_SCAN)) || encrypt.test(trailer)) {
    return { data, removed, encrypted: true, infoUnreachable: false };
  }

  const infoRef = findInfoRef(trailer);
  const range = infoRef ? findObjectRange(input, infoRef) : null;
  if (range) {
    blankLiteralStrings(data, range[0], range[1]);
    blankHexStrings(data, range[0], range[1]);
    removed.push('Document Info');
  }

  const xmp = findXmpStreams(input);
  for (const [start, end] of xmp) {
    data.fill(SPACE, start, end);
  }
  if (xmp.length > 0) removed.push('XMP');

  return { data, removed, encrypted: false, infoUnreachable: infoRef !== null && range === null };
}
