/**
 * Audio tag-layer removal.
 *
 * Handles the tag layers that sit outside the audio payload and can be cut
 * without touching a single audio frame:
 *
 *  • MPEG audio (MP3 / ADTS AAC): leading ID3v2 tags, trailing APEv2 and
 *    ID3v1 tags.
 *  • FLAC: VORBIS_COMMENT and PICTURE metadata blocks (plus any stray ID3v2
 *    prefix or ID3v1 suffix).
 *  • WAV: `LIST`/`INFO` and `id3 ` chunks; the RIFF size is rewritten.
 *
 * Containers that keep tags inside the payload framing (Ogg, Opus, MP4/M4A,
 * ASF/WMA) are not handled and yield `null`.
 */

import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

export type AudioContainer = 'mpeg' | 'flac' | 'wav';

export interface AudioStripResult {
  /** Cleaned bytes; the input itself when nothing was removed. */
  data: Uint8Array;
  container: AudioContainer;
  /** Tag layers that were removed (empty when already clean). */
  removed: string[];
}

const ID3V2_HEADER = 10;
const ID3V2_FOOTER_FLAG = 0x10;
const ID3V1_SIZE = 128;
const APE_FOOTER = 32;

/** FLAC metadata block types */
const FLAC_BLOCK = {
  STREAMINFO: 0,
  VORBIS_COMMENT: 4,
  PICTURE: 6,
} as const;

const FLAC_LAST_BLOCK = 0x80;

// ─── ID3 / APE ───────────────────────────────────────────────────────────────

/**
 * Offset just past every leading ID3v2 tag (0 when there is none).
 */
function skipId3v2(data: Uint8Array): number {
  let offset = 0;
  while (buffer.matchesAt(data, offset, FILE_SIGNATURES.ID3V2) && offset + ID3V2_HEADER <= data.length) {
    const flags = data[offset + 5]!;
    const size = dataview.readSyncsafe(data, offset + 6);
    const total = ID3V2_HEADER + size + (flags & ID3V2_FOOTER_FLAG ? ID3V2_HEADER : 0);
    if (offset + total > data.length) {
      throw new CorruptedFileError('Truncated ID3v2 tag', offset);
    }
    offset += total;
  }
  return offset;
}

/**
 * Strip a trailing ID3v1 tag, then a trailing APEv2 tag, from `data[0, end)`.
 * Returns the new end.
 */
function trimTrailingTags(data: Uint8Array, end: number, removed: string[]): number {
  let cut = end;

  if (cut >= ID3V1_SIZE && buffer.matchesAt(data, cut - ID3V1_SIZE, FILE_SIGNATURES.ID3V1)) {
    cut -= ID3V1_SIZE;
    removed.push('ID3v1');
  }

  if (cut >= APE_FOOTER && buffer.matchesAt(data, cut - APE_FOOTER, FILE_SIGNATURES.APE)) {
    const footer = cut - APE_FOOTER;
    // Tag size counts items + footer; the optional header comes on top.
    const size = dataview.readUint32LE(data, footer + 12);
    const flags = dataview.readUint32LE(data, footer + 20);
    const total = size + (flags >>> 31 === 1 ? APE_FOOTER : 0);
    if (total > cut) {
      throw new CorruptedFileError('APEv2 tag larger than file', footer);
    }
    cut -= total;
    removed.push('APEv2');
  }

  return cut;
}

function looksLikeMpegFrame(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0xff && (data[1]! & 0xe0) === 0xe0;
}

// ─── FLAC ────────────────────────────────────────────────────────────────────

function stripFlac(data: Uint8Array, removed: string[]): Uint8Array {
  const kept: Uint8Array[] = [];
  let offset = FILE_SIGNATURES.FLAC.length;

  for (;;) {
    if (offset + 4 > data.length) {
      throw new CorruptedFileError('Truncated FLAC metadata block header', offset);
    }
    const header = data[offset]!;
    const type = header & 0x7f;
    const length = dataview.readUint24BE(data, offset + 1);
    const end = offset + 4 + length;
    if (end > data.length) {
      throw new CorruptedFileError('Truncated FLAC metadata block', offset);
    }

    if (type === FLAC_BLOCK.VORBIS_COMMENT) {
      removed.push('Vorbis comment');
    } else if (type === FLAC_BLOCK.PICTURE) {
      removed.push('Picture');
    } else {
      kept.push(data.slice(offset, end));
    }

    offset = end;
    if (header & FLAC_LAST_BLOCK) break;
  }

  const first = kept[0];
  if (first === undefined || (first[0]! & 0x7f) !== FLAC_BLOCK.STREAMINFO) {
    throw new CorruptedFileError('FLAC stream does not start with STREAMINFO');
  }

  // Exactly the final kept block carries the last-block flag.
  kept.forEach((block, i) => {
    block[0] = (block[0]! & 0x7f) | (i === kept.length - 1 ? FLAC_LAST_BLOCK : 0);
  });

  const frames = data.subarray(offset, trimTrailingTags(data, data.length, removed));
  return buffer.concat(FILE_SIGNATURES.FLAC, ...kept, frames);
}

// ─── WAV ─────────────────────────────────────────────────────────────────────

function isTagChunk(data: Uint8Array, offset: number, fourcc: string): boolean {
  if (fourcc === 'id3 ' || fourcc === 'ID3 ') return true;
  return fourcc === 'LIST' && buffer.matchesAt(data, offset + 8, 'INFO');
}

function stripWav(data: Uint8Array, removed: string[]): Uint8Array {
  const riffEnd = Math.min(data.length, dataview.readUint32LE(data, 4) + 8);
  const kept: Uint8Array[] = [];
  let offset = 12;

  while (offset + 8 <= riffEnd) {
    const fourcc = buffer.toAscii(data, offset, 4);
    const size = dataview.readUint32LE(data, offset + 4);
    if (offset + 8 + size > data.length) {
      throw new CorruptedFileError(`Truncated WAV ${fourcc} chunk`, offset);
    }
    // Chunks are padded to even sizes.
    const end = Math.min(offset + 8 + size + (size % 2), data.length);

    if (isTagChunk(data, offset, fourcc)) {
      removed.push(fourcc === 'LIST' ? 'RIFF INFO' : 'ID3 chunk');
    } else {
      kept.push(data.subarray(offset, end));
    }
    offset = end;
  }

  const body = buffer.concat(...kept);
  const header = new Uint8Array(12);
  header.set(FILE_SIGNATURES.RIFF, 0);
  dataview.writeUint32LE(header, 4, 4 + body.length);
  header.set(FILE_SIGNATURES.WAVE, 8);
  return buffer.concat(header, body);
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Remove every tag layer from an audio file's bytes, or return `null` when
 * the container is not one of the supported ones.
 */
export function stripAudioTags(input: Uint8Array): AudioStripResult | null {
  const removed: string[] = [];

  const payloadStart = skipId3v2(input);
  if (payloadStart > 0) removed.push('ID3v2');
  const payload = input.subarray(payloadStart);

  let container: AudioContainer;
  let cleaned: Uint8Array;

  if (buffer.startsWith(payload, FILE_SIGNATURES.FLAC)) {
    container = 'flac';
    cleaned = stripFlac(payload, removed);
  } else if (
    buffer.startsWith(payload, FILE_SIGNATURES.RIFF) &&
    buffer.matchesAt(payload, 8, FILE_SIGNATURES.WAVE)
  ) {
    container = 'wav';
    cleaned = stripWav(payload, removed);
  } else if (payloadStart > 0 || looksLikeMpegFrame(payload)) {
    container = 'mpeg';
    cleaned = payload.subarray(0, trimTrailingTags(payload, payload.length, removed));
  } else {
    return null;
  }

  return { data: removed.length > 0 ? cleaned : input, container, removed };
}
