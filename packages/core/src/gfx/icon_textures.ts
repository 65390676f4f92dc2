// Save icon decoding. Icons are 16x16 CI4: each byte holds two palette indices,
// low nibble first. Palette entries are 15-bit BGR (bit 15 is the semi-transparency
// flag and is ignored here).

import { FRAME_SIZE, ICON_SIZE } from '../card/constants.js';

export const ICON_RGBA_BYTES = FRAME_SIZE * 2 * 4; // 1024

// Expand one 15-bit palette entry to RGBA8888. Channels scale by 8, not 255/31,
// so 0x1f maps to 248; existing exported icons depend on that.
export function unpackBGR555(p: number): [number, number, number, number] {
  const r5 = p & 0x1f;
  const g5 = (p >>> 5) & 0x1f;
  const b5 = (p >>> 10) & 0x1f;
  return [r5 * 8, g5 * 8, b5 * 8, 255];
}

// Decode CI4 pixel data using a 16-entry palette into a flat RGBA8888 buffer.
// Output is always data.length * 2 pixels, row-major in byte order.
export function decodeCI4ToRGBA8888(data: Uint8Array, palette: Uint16Array): Uint8Array {
  const out = new Uint8Array(data.length * 2 * 4);
  let di = 0;
  for (let i = 0; i < data.length; i++) {
    const byte = data[i]!;
    const lo = byte & 0x0f; const hi = (byte >>> 4) & 0x0f;
    for (const idx of [lo, hi]) {
      const [r, g, b, a] = unpackBGR555(palette[idx] ?? 0);
      out[di++] = r;
      out[di++] = g;
      out[di++] = b;
      out[di++] = a;
    }
  }
  return out;
}

// One icon frame (128 bytes) -> 16x16 RGBA8888 (1024 bytes).
export function translateIconToRGBA(iconFrame: Uint8Array, palette: Uint16Array): Uint8Array {
  const out = decodeCI4ToRGBA8888(iconFrame.subarray(0, FRAME_SIZE), palette);
  if (out.length !== ICON_RGBA_BYTES) {
    // short frame: pad with opaque black so the image is still 16x16
    const padded = new Uint8Array(ICON_RGBA_BYTES);
    padded.set(out);
    for (let i = out.length + 3; i < ICON_RGBA_BYTES; i += 4) padded[i] = 255;
    return padded;
  }
  return out;
}

export const ICON_WIDTH = ICON_SIZE;
export const ICON_HEIGHT = ICON_SIZE;
