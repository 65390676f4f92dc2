import { MemCardError } from '../card/errors.js';

// Sequential byte source: hands out exactly `n` bytes or throws ShortRead.
export interface ByteSource {
  readExact(n: number): Uint8Array;
}

// Sequential byte sink: accepts every byte given, in order.
export interface ByteSink {
  writeAll(bytes: Uint8Array): void;
}

export class BufferSource implements ByteSource {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  readExact(n: number): Uint8Array {
    if (n > this.remaining) {
      throw new MemCardError('ShortRead', `wanted ${n} bytes at offset 0x${this.pos.toString(16)}, only ${this.remaining} left`);
    }
    const out = this.bytes.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }
}

export class BufferSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  get size(): number {
    return this.length;
  }

  writeAll(bytes: Uint8Array): void {
    this.chunks.push(bytes.slice());
    this.length += bytes.length;
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let off = 0;
    for (const c of this.chunks) {
      out.set(c, off);
      off += c.length;
    }
    return out;
  }
}
