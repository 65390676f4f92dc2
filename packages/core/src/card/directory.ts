import type { DirectoryFrame } from './frames.js';
import { MemCardError } from './errors.js';

export type AllocState =
  | 'AllocFirst'
  | 'AllocMid'
  | 'AllocLast'
  | 'Free'
  | 'FreeFirst'
  | 'FreeMid'
  | 'FreeLast'
  | 'Unknown';

export type Region = 'Japan' | 'America' | 'Europe' | 'Unknown';
export type License = 'Sony' | 'Licensed' | 'Unknown';

export interface RegionInfo {
  region: Region;
  license: License;
  name: string; // filename bytes 12..20
}

export const ALLOC_STATES: Readonly<Record<number, AllocState>> = {
  0x51: 'AllocFirst',
  0x52: 'AllocMid',
  0x53: 'AllocLast',
  0xa0: 'Free',
  0xa1: 'FreeFirst',
  0xa2: 'FreeMid',
  0xa3: 'FreeLast',
};

export function allocState(d: DirectoryFrame): AllocState {
  return ALLOC_STATES[d.state >>> 0] ?? 'Unknown';
}

export function isAllocated(d: DirectoryFrame): boolean {
  const s = allocState(d);
  return s === 'AllocFirst' || s === 'AllocMid' || s === 'AllocLast';
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

// Filename layout: "B" + region + "S" + license + product code + save name,
// e.g. "BASCUS-94244WILDARMS". Region and license are single ASCII letters.
export function regionInfo(d: DirectoryFrame): RegionInfo {
  let region: Region;
  switch (d.filename[1]) {
    case 0x49: region = 'Japan'; break;   // 'I'
    case 0x41: region = 'America'; break; // 'A'
    case 0x45: region = 'Europe'; break;  // 'E'
    default: region = 'Unknown';
  }
  let license: License;
  switch (d.filename[3]) {
    case 0x43: license = 'Sony'; break;     // 'C'
    case 0x4c: license = 'Licensed'; break; // 'L'
    default: license = 'Unknown';
  }
  let name: string;
  try {
    name = utf8.decode(d.filename.subarray(12));
  } catch (e) {
    throw new MemCardError('TextDecoding', `filename bytes 12..${d.filename.length - 1} are not valid UTF-8 (${e instanceof Error ? e.message : String(e)})`);
  }
  return { region, license, name };
}
