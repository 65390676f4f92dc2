import { BLOCK_SIZE, CARD_SIZE, DATA_BLOCKS } from './constants.js';
import { parseDataBlock, serializeDataBlock, decodeDataBlockTitle, type DataBlock } from './data_block.js';
import { allocState, regionInfo, type AllocState, type RegionInfo } from './directory.js';
import type { DirectoryFrame } from './frames.js';
import { parseInfoBlock, serializeInfoBlock, type InfoBlock } from './info_block.js';
import { BufferSink, BufferSource, type ByteSink, type ByteSource } from '../io/byte_stream.js';

// A whole card image: block 0 (directory) plus 15 save blocks, slot i of the
// directory describing data[i]. Fields are edited in place; write() re-stamps
// every checksum from the current values.
export class MemCard {
  constructor(public info: InfoBlock, public data: DataBlock[]) {}

  // Read 16 blocks from `source`. Any short read or bad checksum throws and
  // no MemCard is built.
  static open(source: ByteSource): MemCard {
    const info = parseInfoBlock(source.readExact(BLOCK_SIZE));
    const blocks: Uint8Array[] = [];
    while (blocks.length < DATA_BLOCKS) blocks.push(source.readExact(BLOCK_SIZE));
    const data = blocks.map(parseDataBlock);
    return new MemCard(info, data);
  }

  static fromBytes(bytes: Uint8Array): MemCard {
    return MemCard.open(new BufferSource(bytes));
  }

  write(sink: ByteSink): void {
    sink.writeAll(serializeInfoBlock(this.info));
    for (const db of this.data) sink.writeAll(serializeDataBlock(db));
  }

  toBytes(): Uint8Array {
    const sink = new BufferSink();
    this.write(sink);
    if (sink.size !== CARD_SIZE) throw new Error(`MemCard: wrote ${sink.size} bytes, expected ${CARD_SIZE}`);
    return sink.toBytes();
  }

  // Case-insensitive substring search over decoded titles, in slot order.
  findGame(needle: string): DataBlock[] {
    const n = needle.toLowerCase();
    return this.data.filter((db) => decodeDataBlockTitle(db).toLowerCase().includes(n));
  }

  // Slot numbers whose titles match, for callers that need the directory entry too.
  findSlots(needle: string): number[] {
    const n = needle.toLowerCase();
    const out: number[] = [];
    this.data.forEach((db, i) => {
      if (decodeDataBlockTitle(db).toLowerCase().includes(n)) out.push(i);
    });
    return out;
  }

  directory(slot: number): DirectoryFrame {
    const d = this.info.dirFrames[slot];
    if (!d) throw new RangeError(`slot ${slot} out of range 0..${this.info.dirFrames.length - 1}`);
    return d;
  }

  allocState(slot: number): AllocState {
    return allocState(this.directory(slot));
  }

  regionInfo(slot: number): RegionInfo {
    return regionInfo(this.directory(slot));
  }
}
