import { BLOCK_SIZE, BROKEN_FRAMES, DIRECTORY_FRAMES, FRAME_SIZE, FRAMES_PER_BLOCK, UNUSED_FRAMES } from './constants.js';
import { stampChecksum, validateChecksum } from './checksum.js';
import { MemCardError } from './errors.js';
import {
  decodeBrokenFrame, decodeDirectoryFrame, decodeFrame, decodeHeader,
  encodeBrokenFrame, encodeDirectoryFrame, encodeFrame, encodeHeader, loadFrames,
  type BrokenFrame, type DirectoryFrame, type Frame, type Header,
} from './frames.js';

// Block 0 of the card: identification header, directory, bad-block list,
// reserved frames and the write-test header. Every frame is checksummed.
export interface InfoBlock {
  header: Header;
  dirFrames: DirectoryFrame[];    // 15
  brokenFrames: BrokenFrame[];    // 20
  unusedFrames: Frame[];          // 27
  writeTestFrame: Header;
}

export function parseInfoBlock(block: Uint8Array): InfoBlock {
  if (block.length < BLOCK_SIZE) {
    throw new MemCardError('ShortRead', `info block needs ${BLOCK_SIZE} bytes, have ${block.length}`);
  }
  validateChecksum(block, 0);
  const header = decodeHeader(block, 0);
  let offset = FRAME_SIZE;

  const dirFrames = loadFrames(block.subarray(offset), DIRECTORY_FRAMES, decodeDirectoryFrame, offset);
  offset += dirFrames.length * FRAME_SIZE;

  const brokenFrames = loadFrames(block.subarray(offset), BROKEN_FRAMES, decodeBrokenFrame, offset);
  offset += brokenFrames.length * FRAME_SIZE;

  const unusedFrames = loadFrames(block.subarray(offset), UNUSED_FRAMES, decodeFrame, offset);
  offset += unusedFrames.length * FRAME_SIZE;

  validateChecksum(block, offset);
  const writeTestFrame = decodeHeader(block, offset);

  return { header, dirFrames, brokenFrames, unusedFrames, writeTestFrame };
}

// Encode every record in order, recomputing each checksum on the way out.
// The InfoBlock itself is not modified.
export function serializeInfoBlock(info: InfoBlock): Uint8Array {
  const records: Uint8Array[] = [
    encodeHeader(info.header),
    ...info.dirFrames.map(encodeDirectoryFrame),
    ...info.brokenFrames.map(encodeBrokenFrame),
    ...info.unusedFrames.map(encodeFrame),
    encodeHeader(info.writeTestFrame),
  ];
  if (records.length !== FRAMES_PER_BLOCK) {
    throw new Error(`InfoBlock: ${records.length} records do not fill a block (expected ${FRAMES_PER_BLOCK})`);
  }
  const out = new Uint8Array(BLOCK_SIZE);
  records.forEach((rec, i) => out.set(stampChecksum(rec), i * FRAME_SIZE));
  return out;
}
