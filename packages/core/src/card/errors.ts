export type MemCardErrorCode = 'ShortRead' | 'BadChecksum' | 'TextDecoding' | 'ImageEncoding';

export class MemCardError extends Error {
  constructor(public readonly code: MemCardErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'MemCardError';
  }
}

export class ChecksumMismatchError extends MemCardError {
  constructor(public readonly offset: number, public readonly expected: number, public readonly actual: number) {
    super('BadChecksum', `record at 0x${offset.toString(16)} has checksum 0x${actual.toString(16)}, expected 0x${expected.toString(16)}`);
    this.name = 'ChecksumMismatchError';
  }
}

export function isMemCardError(err: unknown, code?: MemCardErrorCode): err is MemCardError {
  return err instanceof MemCardError && (code === undefined || err.code === code);
}
