import { describe, it, expect } from 'vitest';
import { parseInfoBlock, serializeInfoBlock } from '../src/card/info_block.js';
import { ChecksumMismatchError, isMemCardError } from '../src/card/errors.js';
import { BLOCK, FRAME, WRITE_TEST_OFFSET, brokenFrameOffset, buildCardImage, dirFrameOffset, unusedFrameOffset, xorChecksum } from './helpers/card_builder.js';

function block0(): Uint8Array {
  return buildCardImage([{ slot: 0, title: 'Wild Arms', filename: 'BASCUS-94244WILDARMS' }]).slice(0, BLOCK);
}

function parseError(block: Uint8Array): unknown {
  try {
    parseInfoBlock(block);
  } catch (e) {
    return e;
  }
  return null;
}

describe('info block', () => {
  it('splits block 0 into header, 15 directory, 20 broken, 27 unused and write-test frames', () => {
    const info = parseInfoBlock(block0());
    expect(Array.from(info.header.id)).toEqual([0x4d, 0x43]);
    expect(info.dirFrames.length).toBe(15);
    expect(info.brokenFrames.length).toBe(20);
    expect(info.unusedFrames.length).toBe(27);
    expect(Array.from(info.writeTestFrame.id)).toEqual([0x4d, 0x43]);

    expect(info.dirFrames[0]!.state).toBe(0x51);
    expect(info.dirFrames[0]!.filesize).toBe(0x2000);
    expect(info.dirFrames[1]!.state).toBe(0xa0);
    expect(info.brokenFrames[19]!.brokenFrame).toBe(0xffffffff);
  });

  it('serializes back to the same 8192 bytes', () => {
    const bytes = block0();
    const out = serializeInfoBlock(parseInfoBlock(bytes));
    expect(out.length).toBe(8192);
    expect(Buffer.from(out).equals(Buffer.from(bytes))).toBe(true);
  });

  it('restamps checksums of edited records', () => {
    const info = parseInfoBlock(block0());
    info.brokenFrames[0]!.brokenFrame = 12345;
    info.header.id[1] = 0x22;
    const out = serializeInfoBlock(info);
    const off = brokenFrameOffset(0);
    expect(out[off]).toBe(0x39);
    expect(out[off + 1]).toBe(0x30);
    expect(out[off + FRAME - 1]).toBe(xorChecksum(out, off));
    expect(out[FRAME - 1]).toBe(xorChecksum(out, 0));
    // the stored model value is left alone
    const reparsed = parseInfoBlock(out);
    expect(reparsed.brokenFrames[0]!.brokenFrame).toBe(12345);
    expect(reparsed.header.checksum).toBe(out[FRAME - 1]);
  });

  it('fails on a bad checksum in any section, naming the record offset', () => {
    const offsets = [0, dirFrameOffset(14), brokenFrameOffset(3), unusedFrameOffset(26), WRITE_TEST_OFFSET];
    for (const off of offsets) {
      const bytes = block0();
      bytes[off + 40] = bytes[off + 40]! ^ 0xff;
      const err = parseError(bytes);
      expect(err).toBeInstanceOf(ChecksumMismatchError);
      if (err instanceof ChecksumMismatchError) expect(err.offset).toBe(off);
    }
  });

  it('fails with a short read on a truncated block', () => {
    expect(isMemCardError(parseError(block0().slice(0, BLOCK - 1)), 'ShortRead')).toBe(true);
  });
});
