import { CHECKSUM_OFFSET, FRAME_SIZE } from './constants.js';
import { ChecksumMismatchError, MemCardError } from './errors.js';

// XOR of bytes [0, 126]; byte 127 holds the result and is never folded in.
export function checksum(record: Uint8Array, offset = 0): number {
  if (record.length < offset + FRAME_SIZE) {
    throw new MemCardError('ShortRead', `checksum needs ${FRAME_SIZE} bytes at 0x${offset.toString(16)}, have ${Math.max(0, record.length - offset)}`);
  }
  let c = 0;
  for (let i = 0; i < CHECKSUM_OFFSET; i++) c ^= record[offset + i]!;
  return c & 0xff;
}

// Throws ChecksumMismatchError when the stored byte disagrees with the computed one.
// `reportOffset` is only used for the error message (position of the record in its block).
export function validateChecksum(record: Uint8Array, offset = 0, reportOffset = offset): void {
  const expected = checksum(record, offset);
  const actual = record[offset + CHECKSUM_OFFSET]!;
  if (expected !== actual) throw new ChecksumMismatchError(reportOffset, expected, actual);
}

// Write the checksum of the 128-byte record at `offset` into its last byte.
export function stampChecksum(record: Uint8Array, offset = 0): Uint8Array {
  record[offset + CHECKSUM_OFFSET] = checksum(record, offset);
  validateChecksum(record, offset);
  return record;
}
