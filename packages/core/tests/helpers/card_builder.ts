// Synthetic card images for tests. Bytes are laid out by hand (not through the
// codec under test) so decode results can be checked against known offsets.

export const FRAME = 0x80;
export const BLOCK = 0x2000;
export const CARD = 16 * BLOCK;

export interface SaveSpec {
  slot: number;          // 0..14, data block = slot + 1
  title: string;         // [0-9A-Za-z ] only
  display?: number;      // default 0x11
  filename?: string;     // ASCII, up to 21 chars
  filesize?: number;
  state?: number;        // default 0x51
  palette?: number[];    // up to 16 BGR555 values
  iconBytes?: number[];  // fill byte for each icon frame
  payloadByte?: number;
}

export function xorChecksum(bytes: Uint8Array, offset: number): number {
  let c = 0;
  for (let i = 0; i < FRAME - 1; i++) c ^= bytes[offset + i]!;
  return c;
}

export function stampAt(bytes: Uint8Array, offset: number): void {
  bytes[offset + FRAME - 1] = xorChecksum(bytes, offset);
}

export function sjisTitle(text: string): number[] {
  const out: number[] = [];
  for (const ch of text) {
    const c = ch.charCodeAt(0);
    if (ch === ' ') out.push(0x81, 0x40);
    else if ((c >= 0x30 && c <= 0x39) || (c >= 0x41 && c <= 0x5a)) out.push(0x82, c + 0x1f);
    else if (c >= 0x61 && c <= 0x7a) out.push(0x82, c + 0x20);
  }
  return out;
}

function putU32(bytes: Uint8Array, off: number, v: number): void {
  bytes[off] = v & 0xff; bytes[off + 1] = (v >>> 8) & 0xff; bytes[off + 2] = (v >>> 16) & 0xff; bytes[off + 3] = (v >>> 24) & 0xff;
}

function putU16(bytes: Uint8Array, off: number, v: number): void {
  bytes[off] = v & 0xff; bytes[off + 1] = (v >>> 8) & 0xff;
}

export function dirFrameOffset(slot: number): number {
  return FRAME * (1 + slot);
}

export function brokenFrameOffset(i: number): number {
  return FRAME * (16 + i);
}

export function unusedFrameOffset(i: number): number {
  return FRAME * (36 + i);
}

export const WRITE_TEST_OFFSET = FRAME * 63;

export function buildCardImage(saves: SaveSpec[] = []): Uint8Array {
  const card = new Uint8Array(CARD);

  // header "MC"
  card[0] = 0x4d; card[1] = 0x43;
  stampAt(card, 0);

  for (let slot = 0; slot < 15; slot++) {
    const off = dirFrameOffset(slot);
    putU32(card, off, 0xa0);
    putU16(card, off + 8, 0xffff);
  }
  for (let i = 0; i < 20; i++) {
    const off = brokenFrameOffset(i);
    putU32(card, off, 0xffffffff);
  }

  // write-test header mirrors the card header
  card[WRITE_TEST_OFFSET] = 0x4d; card[WRITE_TEST_OFFSET + 1] = 0x43;

  for (const s of saves) {
    const d = dirFrameOffset(s.slot);
    putU32(card, d, s.state ?? 0x51);
    putU32(card, d + 4, s.filesize ?? 0x2000);
    putU16(card, d + 8, 0xffff);
    const name = s.filename ?? 'BASCUS-94244SAVE00';
    for (let i = 0; i < name.length && i < 21; i++) card[d + 10 + i] = name.charCodeAt(i);

    const base = BLOCK * (1 + s.slot);
    const display = s.display ?? 0x11;
    card[base] = 0x53; card[base + 1] = 0x43; // "SC"
    card[base + 2] = display;
    card[base + 3] = 1;
    sjisTitle(s.title).slice(0, 64).forEach((b, i) => { card[base + 4 + i] = b; });
    (s.palette ?? []).slice(0, 16).forEach((p, i) => putU16(card, base + 96 + i * 2, p));

    const icons = display & 0x03;
    for (let f = 0; f < icons; f++) {
      card.fill(s.iconBytes?.[f] ?? 0, base + FRAME * (1 + f), base + FRAME * (2 + f));
    }
    card.fill(s.payloadByte ?? 0, base + FRAME * (1 + icons), base + BLOCK);
  }

  for (let i = 0; i < 64; i++) stampAt(card, i * FRAME);
  return card;
}
