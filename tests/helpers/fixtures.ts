import JSZip from 'jszip';
import { concat, fromAscii } from '../../src/binary/buffer.js';

// ─── PDF ──────────────────────────────────────────────────────────────────────

export interface PdfFixture {
  title?: string;
  /** Hex-encoded author, written as `<…>`. */
  authorHex?: string;
  xmp?: string;
  encrypted?: boolean;
}

/**
 * A minimal PDF whose trailer points at an Info dictionary (object 3) and,
 * optionally, an XMP metadata stream (object 4).
 */
export function buildPdf(fixture: PdfFixture = {}): Uint8Array {
  const parts = [
    '%PDF-1.4\n',
    '1 0 obj\n<< /Type /Catalog /Pages 2 0 R >>\nendobj\n',
    '2 0 obj\n<< /Type /Pages /Kids [] /Count 0 >>\nendobj\n',
    `3 0 obj\n<< /Title (${fixture.title ?? 'Secret Plan'}) /Author <${fixture.authorHex ?? '4A616E65'}> >>\nendobj\n`,
  ];
  if (fixture.xmp !== undefined) {
    parts.push(
      `4 0 obj\n<< /Type /Metadata /Subtype /XML /Length ${fixture.xmp.length} >>\nstream\n${fixture.xmp}\nendstream\nendobj\n`,
    );
  }
  const encrypt = fixture.encrypted ? ' /Encrypt 5 0 R' : '';
  parts.push(`trailer\n<< /Size 5 /Root 1 0 R${encrypt} /Info 3 0 R >>\n%%EOF\n`);
  return fromAscii(parts.join(''));
}

export interface XrefStreamPdfFixture {
  encrypted?: boolean;
  /** Keep the Info dictionary (object 3) inside an object stream instead of as a plain object. */
  compressedInfo?: boolean;
}

/**
 * A PDF 1.5 file with no `trailer` keyword: its trailer entries live in a
 * cross-reference stream (object 5) that `startxref` points at.
 */
export function buildXrefStreamPdf(fixture: XrefStreamPdfFixture = {}): Uint8Array {
  const parts = [
    '%PDF-1.5\n',
    '1 0 obj\n<< /Type /Catalog /Pages 2 0 R >>\nendobj\n',
    '2 0 obj\n<< /Type /Pages /Kids [] /Count 0 >>\nendobj\n',
    fixture.compressedInfo
      ? '4 0 obj\n<< /Type /ObjStm /N 1 /First 4 /Length 8 >>\nstream\nxxxxxxxx\nendstream\nendobj\n'
      : '3 0 obj\n<< /Title (Secret Plan) /Author (Jane Doe) >>\nendobj\n',
  ];
  const offset = parts.join('').length;
  const encrypt = fixture.encrypted ? ' /Encrypt 6 0 R' : '';
  parts.push(
    `5 0 obj\n<< /Type /XRef /Size 7 /W [1 2 1] /Root 1 0 R /Info 3 0 R${encrypt} /Length 0 >>\nstream\n\nendstream\nendobj\n`,
    `startxref\n${offset}\n%%EOF\n`,
  );
  return fromAscii(parts.join(''));
}

// ─── Audio ────────────────────────────────────────────────────────────────────

/** One MPEG-1 Layer III frame header followed by silence. */
export function mpegFrame(length = 64): Uint8Array {
  const frame = new Uint8Array(length);
  frame.set([0xff, 0xfb, 0x90, 0x00]);
  return frame;
}

/** An ID3v2.3 tag with `payloadSize` bytes of frame data. */
export function id3v2Tag(payloadSize = 10): Uint8Array {
  const header = new Uint8Array(10);
  header.set(fromAscii('ID3'));
  header.set([3, 0, 0], 3);
  header.set([0, 0, (payloadSize >> 7) & 0x7f, payloadSize & 0x7f], 6);
  return concat(header, new Uint8Array(payloadSize).fill(0x41));
}

/** A 128-byte ID3v1 trailer. */
export function id3v1Tag(): Uint8Array {
  const tag = new Uint8Array(128).fill(0x20);
  tag.set(fromAscii('TAG'));
  tag.set(fromAscii('Test Song'), 3);
  return tag;
}

function flacBlock(type: number, length: number, last: boolean): Uint8Array {
  const block = new Uint8Array(4 + length).fill(0x11, 4);
  block[0] = type | (last ? 0x80 : 0);
  block.set([(length >> 16) & 0xff, (length >> 8) & 0xff, length & 0xff], 1);
  return block;
}

export const FLAC_FRAMES = new Uint8Array([0xff, 0xf8, 0x01, 0x02, 0x03]);

/**
 * fLaC + STREAMINFO (34 bytes) + VORBIS_COMMENT (8) + PICTURE (4, last) + frames.
 */
export function buildFlac(): Uint8Array {
  return concat(
    fromAscii('fLaC'),
    flacBlock(0, 34, false),
    flacBlock(4, 8, false),
    flacBlock(6, 4, true),
    FLAC_FRAMES,
  );
}

function u32le(value: number): Uint8Array {
  return new Uint8Array([value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff]);
}

function chunk(fourcc: string, body: Uint8Array): Uint8Array {
  return concat(fromAscii(fourcc), u32le(body.length), body);
}

export const WAV_FMT = chunk('fmt ', new Uint8Array(16).fill(0x01));
export const WAV_DATA = chunk('data', new Uint8Array([1, 2, 3, 4]));

/**
 * RIFF/WAVE with fmt, LIST/INFO and data chunks.
 */
export function buildWav(): Uint8Array {
  const info = chunk('LIST', concat(fromAscii('INFO'), fromAscii('INAM'), u32le(0)));
  const body = concat(fromAscii('WAVE'), WAV_FMT, info, WAV_DATA);
  return concat(fromAscii('RIFF'), u32le(body.length), body);
}

// ─── Office ───────────────────────────────────────────────────────────────────

export const CORE_XML_WITH_METADATA =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
  '<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" ' +
  'xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:dcterms="http://purl.org/dc/terms/" ' +
  'xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">' +
  '<dc:title>Quarterly Plan</dc:title>' +
  '<dc:creator>Jane Doe</dc:creator>' +
  '<cp:lastModifiedBy>John Roe</cp:lastModifiedBy>' +
  '<cp:revision>7</cp:revision>' +
  '<dcterms:created xsi:type="dcterms:W3CDTF">2024-01-02T03:04:05Z</dcterms:created>' +
  '<dcterms:modified xsi:type="dcterms:W3CDTF">2024-01-03T03:04:05Z</dcterms:modified>' +
  '</cp:coreProperties>';

export const APP_XML_WITH_METADATA =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
  '<Properties><Company>Example Corp</Company><Manager>Pat Boss</Manager><Pages>3</Pages></Properties>';

export const DOCUMENT_XML = '<w:document><w:body><w:p>Hello</w:p></w:body></w:document>';

/**
 * A small .docx-shaped OPC package.
 */
export async function buildDocx(): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('[Content_Types].xml', '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>');
  zip.file('word/document.xml', DOCUMENT_XML);
  zip.file('docProps/core.xml', CORE_XML_WITH_METADATA);
  zip.file('docProps/app.xml', APP_XML_WITH_METADATA);
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}
