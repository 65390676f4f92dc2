import { BLOCK_SIZE, FRAME_SIZE } from './constants.js';
import { MemCardError } from './errors.js';
import { decodeTitleFrame, encodeFrame, encodeTitleFrame, readFrames, type Frame, type TitleFrame } from './frames.js';
import { titleText } from './title.js';
import { ICON_HEIGHT, ICON_WIDTH, translateIconToRGBA } from '../gfx/icon_textures.js';
import type { AnimationEncoder, StillImageEncoder } from '../gfx/encoders.js';

// One save slot's block: title frame, 0..3 icon frames, then save payload.
export interface DataBlock {
  titleFrame: TitleFrame;
  iconFrames: Frame[];
  dataFrames: Frame[];
}

export interface IconExport {
  stills: Uint8Array[];
  animation: Uint8Array | null; // only when there is more than one icon frame
}

export interface IconEncoders {
  still: StillImageEncoder;
  animation: AnimationEncoder;
}

// Values outside 1..3 are not rejected: 0x14 masks to 0 icon frames.
export function iconCountOf(display: number): number {
  return display & 0x03;
}

export function dataFrameCountFor(iconCount: number): number {
  return (BLOCK_SIZE - FRAME_SIZE - iconCount * FRAME_SIZE) / FRAME_SIZE;
}

export function parseDataBlock(block: Uint8Array): DataBlock {
  if (block.length < BLOCK_SIZE) {
    throw new MemCardError('ShortRead', `data block needs ${BLOCK_SIZE} bytes, have ${block.length}`);
  }
  // No checksum on data blocks
  const titleFrame = decodeTitleFrame(block, 0);

  const iconCount = iconCountOf(titleFrame.display);
  const iconFrames = readFrames(block.subarray(FRAME_SIZE), iconCount);

  const next = FRAME_SIZE + iconFrames.length * FRAME_SIZE;
  const dataCount = (BLOCK_SIZE - next) / FRAME_SIZE;
  const dataFrames = readFrames(block.subarray(next, BLOCK_SIZE), dataCount);

  return { titleFrame, iconFrames, dataFrames };
}

export function serializeDataBlock(db: DataBlock): Uint8Array {
  const records = [encodeTitleFrame(db.titleFrame), ...db.iconFrames.map(encodeFrame), ...db.dataFrames.map(encodeFrame)];
  const total = records.length * FRAME_SIZE;
  if (total !== BLOCK_SIZE) {
    throw new Error(`DataBlock: ${db.iconFrames.length} icon + ${db.dataFrames.length} data frames serialize to ${total} bytes, expected ${BLOCK_SIZE}`);
  }
  const out = new Uint8Array(BLOCK_SIZE);
  records.forEach((rec, i) => out.set(rec, i * FRAME_SIZE));
  return out;
}

export function decodeDataBlockTitle(db: DataBlock): string {
  return titleText(db.titleFrame);
}

// RGBA8888 pixels of every icon frame, in animation order.
export function iconImages(db: DataBlock): Uint8Array[] {
  return db.iconFrames.map((f) => translateIconToRGBA(f.data, db.titleFrame.iconPalette));
}

// Hand each icon frame to the still encoder; with two or more frames also
// build a looping animation. Encoder failures propagate unchanged.
export function exportImages(db: DataBlock, encoders: IconEncoders): IconExport {
  const pixels = iconImages(db);
  const stills = pixels.map((data) => encoders.still.encodeStill({ width: ICON_WIDTH, height: ICON_HEIGHT, data }));
  const animation = pixels.length > 1
    ? encoders.animation.encodeAnimation(ICON_WIDTH, ICON_HEIGHT, pixels, 'infinite')
    : null;
  return { stills, animation };
}
