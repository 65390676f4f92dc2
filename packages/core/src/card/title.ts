import type { TitleFrame } from './frames.js';

export type IconDisplay = 'OneFrame' | 'TwoFrames' | 'ThreeFrames' | 'UnknownFrames';

// Partial Shift-JIS decode of a title field: full-width space, digits and
// Latin letters only. Punctuation (0x81 0x43..0x97) and kana are dropped.
// Always steps two bytes at a time; a 0x00 lead byte ends the string.
export function decodeTitle(title: Uint8Array): string {
  let s = '';
  for (let p = 0; p < title.length; p += 2) {
    const lead = title[p]!;
    const trail = title[p + 1] ?? 0;
    if (lead === 0x00) break;
    if (lead === 0x81) {
      if (trail === 0x40) s += ' ';
    } else if (lead === 0x82) {
      if ((trail >= 0x4f && trail <= 0x58) || (trail >= 0x60 && trail <= 0x79)) {
        // 0..9, A..Z
        s += String.fromCharCode(trail - 0x1f);
      } else if (trail >= 0x81 && trail <= 0x9a) {
        // a..z
        s += String.fromCharCode(trail - 0x20);
      }
    }
  }
  return s;
}

export function titleText(t: TitleFrame): string {
  return decodeTitle(t.title);
}

export function iconDisplay(t: TitleFrame): IconDisplay {
  switch (t.display) {
    case 0x11: return 'OneFrame';
    case 0x12: return 'TwoFrames';
    case 0x13: return 'ThreeFrames';
    default: return 'UnknownFrames';
  }
}
