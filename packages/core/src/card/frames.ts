import { FRAME_SIZE, ICON_PALETTE_ENTRIES } from './constants.js';
import { validateChecksum } from './checksum.js';
import { MemCardError } from './errors.js';
import { copyBytes, readU16LE, readU32LE, writeU16LE, writeU32LE } from '../utils/bit.js';

// Record shapes. Every record is exactly FRAME_SIZE bytes; fields map to fixed offsets.

export interface Frame {
  data: Uint8Array; // 128 bytes
}

export interface Header {
  id: Uint8Array;   // 2 bytes, "MC" on a formatted card
  pad: Uint8Array;  // 125 bytes
  checksum: number;
}

export interface DirectoryFrame {
  state: number;        // u32 allocation state
  filesize: number;     // u32
  nextBlock: number;    // u16, 0xffff terminates the chain
  filename: Uint8Array; // 21 bytes, e.g. "BASCUS-94244WILDARMS"
  pad: Uint8Array;      // 96 bytes
  checksum: number;
}

export interface BrokenFrame {
  brokenFrame: number; // u32
  pad: Uint8Array;     // 123 bytes
  checksum: number;
}

export interface TitleFrame {
  id: Uint8Array;          // 2 bytes, "SC"
  display: number;         // icon display flag, low 2 bits = icon frame count
  blockNum: number;
  title: Uint8Array;       // 64 bytes of Shift-JIS
  reserved: Uint8Array;    // 28 bytes
  iconPalette: Uint16Array; // 16 x 15-bit colors
}

export type FrameDecoder<T> = (bytes: Uint8Array, offset: number) => T;

function requireRecord(bytes: Uint8Array, offset: number): void {
  if (offset < 0 || bytes.length < offset + FRAME_SIZE) {
    throw new MemCardError('ShortRead', `record at 0x${offset.toString(16)} needs ${FRAME_SIZE} bytes, have ${Math.max(0, bytes.length - offset)}`);
  }
}

export function decodeFrame(bytes: Uint8Array, offset = 0): Frame {
  requireRecord(bytes, offset);
  return { data: copyBytes(bytes, offset, FRAME_SIZE) };
}

export function encodeFrame(frame: Frame): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE);
  out.set(frame.data.subarray(0, FRAME_SIZE));
  return out;
}

export function decodeHeader(bytes: Uint8Array, offset = 0): Header {
  requireRecord(bytes, offset);
  return {
    id: copyBytes(bytes, offset, 2),
    pad: copyBytes(bytes, offset + 2, 125),
    checksum: bytes[offset + 127]!,
  };
}

export function encodeHeader(h: Header): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE);
  out.set(h.id.subarray(0, 2), 0);
  out.set(h.pad.subarray(0, 125), 2);
  out[127] = h.checksum & 0xff;
  return out;
}

export function decodeDirectoryFrame(bytes: Uint8Array, offset = 0): DirectoryFrame {
  requireRecord(bytes, offset);
  return {
    state: readU32LE(bytes, offset),
    filesize: readU32LE(bytes, offset + 4),
    nextBlock: readU16LE(bytes, offset + 8),
    filename: copyBytes(bytes, offset + 10, 21),
    pad: copyBytes(bytes, offset + 31, 96),
    checksum: bytes[offset + 127]!,
  };
}

export function encodeDirectoryFrame(d: DirectoryFrame): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE);
  writeU32LE(out, 0, d.state >>> 0);
  writeU32LE(out, 4, d.filesize >>> 0);
  writeU16LE(out, 8, d.nextBlock & 0xffff);
  out.set(d.filename.subarray(0, 21), 10);
  out.set(d.pad.subarray(0, 96), 31);
  out[127] = d.checksum & 0xff;
  return out;
}

export function decodeBrokenFrame(bytes: Uint8Array, offset = 0): BrokenFrame {
  requireRecord(bytes, offset);
  return {
    brokenFrame: readU32LE(bytes, offset),
    pad: copyBytes(bytes, offset + 4, 123),
    checksum: bytes[offset + 127]!,
  };
}

export function encodeBrokenFrame(b: BrokenFrame): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE);
  writeU32LE(out, 0, b.brokenFrame >>> 0);
  out.set(b.pad.subarray(0, 123), 4);
  out[127] = b.checksum & 0xff;
  return out;
}

// The title frame carries no checksum; its last 32 bytes are the icon palette.
export function decodeTitleFrame(bytes: Uint8Array, offset = 0): TitleFrame {
  requireRecord(bytes, offset);
  const iconPalette = new Uint16Array(ICON_PALETTE_ENTRIES);
  for (let i = 0; i < ICON_PALETTE_ENTRIES; i++) iconPalette[i] = readU16LE(bytes, offset + 96 + i * 2);
  return {
    id: copyBytes(bytes, offset, 2),
    display: bytes[offset + 2]!,
    blockNum: bytes[offset + 3]!,
    title: copyBytes(bytes, offset + 4, 64),
    reserved: copyBytes(bytes, offset + 68, 28),
    iconPalette,
  };
}

export function encodeTitleFrame(t: TitleFrame): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE);
  out.set(t.id.subarray(0, 2), 0);
  out[2] = t.display & 0xff;
  out[3] = t.blockNum & 0xff;
  out.set(t.title.subarray(0, 64), 4);
  out.set(t.reserved.subarray(0, 28), 68);
  for (let i = 0; i < ICON_PALETTE_ENTRIES; i++) writeU16LE(out, 96 + i * 2, t.iconPalette[i] ?? 0);
  return out;
}

// Read `n` consecutive checksummed records from the start of `bytes`.
// The first bad checksum throws; nothing read before it is returned.
// `baseOffset` is the position of `bytes` within its block, for error reports.
export function loadFrames<T>(bytes: Uint8Array, n: number, decode: FrameDecoder<T>, baseOffset = 0): T[] {
  const out: T[] = [];
  for (let i = 0; i < n; i++) {
    const off = i * FRAME_SIZE;
    requireRecord(bytes, off);
    validateChecksum(bytes, off, baseOffset + off);
    out.push(decode(bytes, off));
  }
  return out;
}

// Read `n` consecutive records without checksum validation (data block contents).
export function readFrames(bytes: Uint8Array, n: number): Frame[] {
  const out: Frame[] = [];
  for (let i = 0; i < n; i++) out.push(decodeFrame(bytes, i * FRAME_SIZE));
  return out;
}
