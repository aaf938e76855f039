/**
 * Container signatures (magic bytes) used by the built-in rewriters
 */
export const FILE_SIGNATURES = {
  PDF: new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d]), // %PDF-

  // OPC packages (docx/xlsx/pptx) are zip archives
  ZIP: new Uint8Array([0x50, 0x4b, 0x03, 0x04]), // PK\3\4

  // Audio tag layers
  ID3V2: new Uint8Array([0x49, 0x44, 0x33]), // ID3
  ID3V1: new Uint8Array([0x54, 0x41, 0x47]), // TAG (last 128 bytes)
  APE: new Uint8Array([0x41, 0x50, 0x45, 0x54, 0x41, 0x47, 0x45, 0x58]), // APETAGEX

  // Audio containers
  FLAC: new Uint8Array([0x66, 0x4c, 0x61, 0x43]), // fLaC
  RIFF: new Uint8Array([0x52, 0x49, 0x46, 0x46]),
  WAVE: new Uint8Array([0x57, 0x41, 0x56, 0x45]), // at offset 8
} as const;
