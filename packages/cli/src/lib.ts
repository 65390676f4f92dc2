import { closeSync, mkdirSync, openSync, readSync, renameSync, rmSync, writeFileSync, writeSync } from 'node:fs';
import path from 'node:path';
import pngjs from 'pngjs';
import omggif from 'omggif';
import {
  MemCard, MemCardError, allocState, decodeDataBlockTitle, exportImages, iconDisplay, regionInfo, titleText,
  type AnimationEncoder, type AnimationRepeat, type ByteSink, type ByteSource, type DataBlock, type DirectoryFrame,
  FRAME_SIZE, type IconEncoders, type RGBAImage, type StillImageEncoder, type TitleFrame,
} from '@memcard/core';

const { PNG } = pngjs;
const { GifWriter } = omggif;

export function crc32(data: Uint8Array): string {
  let crc = 0xFFFFFFFF >>> 0;
  for (let i = 0; i < data.length; i++) {
    let c = (crc ^ data[i]!) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  crc = (~crc) >>> 0;
  return (crc >>> 0).toString(16).padStart(8, '0');
}

// File descriptor backed source/sink. The caller owns the descriptor.
export class FileSource implements ByteSource {
  private pos = 0;

  constructor(private readonly fd: number) {}

  readExact(n: number): Uint8Array {
    const out = new Uint8Array(n);
    let got = 0;
    while (got < n) {
      const r = readSync(this.fd, out, got, n - got, null);
      if (r === 0) {
        throw new MemCardError('ShortRead', `wanted ${n} bytes at offset 0x${this.pos.toString(16)}, file ended after ${got}`);
      }
      got += r;
    }
    this.pos += n;
    return out;
  }
}

type WriteFn = (fd: number, buffer: Uint8Array, offset: number, length: number) => number;

export class FileSink implements ByteSink {
  constructor(private readonly fd: number, private readonly write: WriteFn = writeSync) {}

  writeAll(bytes: Uint8Array): void {
    let done = 0;
    while (done < bytes.length) {
      const w = this.write(this.fd, bytes, done, bytes.length - done);
      if (w === 0) {
        throw new MemCardError('ShortRead', `wrote ${done} of ${bytes.length} bytes, file accepted no more`);
      }
      done += w;
    }
  }
}

export function openCardFile(filePath: string): MemCard {
  const fd = openSync(filePath, 'r');
  try {
    return MemCard.open(new FileSource(fd));
  } finally {
    closeSync(fd);
  }
}

// The whole image is serialized before the destination is touched, then written
// to a sibling temp file and renamed over it, so a failed save leaves the old file.
export function saveCardFile(card: MemCard, filePath: string): void {
  const bytes = card.toBytes();
  const tmp = `${filePath}.${process.pid}.tmp`;
  const fd = openSync(tmp, 'w');
  try {
    try {
      new FileSink(fd).writeAll(bytes);
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, filePath);
  } catch (e) {
    rmSync(tmp, { force: true });
    throw e;
  }
}

function checkRGBA(width: number, height: number, data: Uint8Array): void {
  if (data.length !== width * height * 4) {
    throw new MemCardError('ImageEncoding', `expected ${width * height * 4} RGBA bytes for ${width}x${height}, got ${data.length}`);
  }
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class PngStillEncoder implements StillImageEncoder {
  encodeStill(image: RGBAImage): Uint8Array {
    checkRGBA(image.width, image.height, image.data);
    const png = new PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(image.data);
    try {
      return PNG.sync.write(png, { colorType: 6 });
    } catch (e) {
      throw new MemCardError('ImageEncoding', `PNG: ${describeError(e)}`);
    }
  }
}

// GIF89a with one global palette built from the exact colors in the frames.
// Icons use at most 16 colors per frame, so no quantization is needed.
export class GifAnimationEncoder implements AnimationEncoder {
  constructor(private readonly delayCs = 20) {}

  encodeAnimation(width: number, height: number, frames: readonly Uint8Array[], repeat: AnimationRepeat): Uint8Array {
    if (frames.length === 0) throw new MemCardError('ImageEncoding', 'GIF: no frames');
    const pixels = width * height;
    const colors: number[] = [];
    const lookup = new Map<number, number>();
    const indexed = frames.map((f) => {
      checkRGBA(width, height, f);
      const out: number[] = [];
      for (let i = 0; i < pixels; i++) {
        const rgb = ((f[i * 4]! << 16) | (f[i * 4 + 1]! << 8) | f[i * 4 + 2]!) >>> 0;
        let k = lookup.get(rgb);
        if (k === undefined) {
          if (colors.length === 256) throw new MemCardError('ImageEncoding', 'GIF: more than 256 colors');
          k = colors.length;
          colors.push(rgb);
          lookup.set(rgb, k);
        }
        out.push(k);
      }
      return out;
    });

    // palette length must be a power of two, 2..256
    let size = 2;
    while (size < colors.length) size <<= 1;
    const palette = colors.concat(Array.from({ length: size - colors.length }, () => 0));

    const buf = Buffer.alloc(1024 + frames.length * (pixels * 2 + 1024));
    try {
      const writer = new GifWriter(buf, width, height, { loop: repeat === 'infinite' ? 0 : repeat, palette });
      for (const px of indexed) writer.addFrame(0, 0, width, height, px, { delay: this.delayCs });
      const n = writer.end();
      return new Uint8Array(buf.subarray(0, n));
    } catch (e) {
      throw new MemCardError('ImageEncoding', `GIF: ${describeError(e)}`);
    }
  }
}

export function defaultEncoders(): IconEncoders {
  return { still: new PngStillEncoder(), animation: new GifAnimationEncoder() };
}

// Write <title>_frame<n>.png for every icon frame and <title>.gif when animated.
// Returns the paths written.
export function exportIconFiles(db: DataBlock, outDir: string, fallbackName: string, encoders: IconEncoders = defaultEncoders()): string[] {
  const { stills, animation } = exportImages(db, encoders);
  const base = decodeDataBlockTitle(db).trim() || fallbackName;
  mkdirSync(outDir, { recursive: true });
  const written: string[] = [];
  stills.forEach((png, n) => {
    const p = path.join(outDir, `${base}_frame${n}.png`);
    writeFileSync(p, png);
    written.push(p);
  });
  if (animation) {
    const p = path.join(outDir, `${base}.gif`);
    writeFileSync(p, animation);
    written.push(p);
  }
  return written;
}

export function describeDirectoryFrame(d: DirectoryFrame): string {
  let region: string;
  try {
    const info = regionInfo(d);
    region = `${info.region} / ${info.license} / ${info.name.replace(/\u0000+$/, '')}`;
  } catch (e) {
    region = `unreadable (${describeError(e)})`;
  }
  return [
    ` State: ${allocState(d)}`,
    ` Filesize: ${d.filesize}`,
    ` Next block: ${d.nextBlock}`,
    ` Region Info: ${region}`,
    ` Checksum: ${d.checksum}`,
  ].join('\n');
}

export function describeTitleFrame(t: TitleFrame): string {
  return [
    ` Filename: ${titleText(t)}`,
    ` Icon: ${iconDisplay(t)}`,
    ` Block Number: ${t.blockNum}`,
  ].join('\n');
}

export interface SlotSummary {
  slot: number;
  state: string;
  filesize: number;
  nextBlock: number;
  title: string;
  icon: string;
  iconFrames: number;
  region: string | null;
  payloadCRC32: string;
}

export function summarizeSlot(card: MemCard, slot: number): SlotSummary {
  const d = card.directory(slot);
  const db = card.data[slot];
  if (!db) throw new RangeError(`slot ${slot} has no data block`);
  let region: string | null;
  try {
    region = card.regionInfo(slot).region;
  } catch {
    region = null;
  }
  const payload = new Uint8Array(db.dataFrames.length * FRAME_SIZE);
  db.dataFrames.forEach((f, i) => payload.set(f.data, i * FRAME_SIZE));
  return {
    slot,
    state: allocState(d),
    filesize: d.filesize,
    nextBlock: d.nextBlock,
    title: decodeDataBlockTitle(db),
    icon: iconDisplay(db.titleFrame),
    iconFrames: db.iconFrames.length,
    region,
    payloadCRC32: crc32(payload),
  };
}
