#!/usr/bin/env node
import { DATA_BLOCKS, isAllocated, type MemCard } from '@memcard/core';
import {
  describeDirectoryFrame, describeTitleFrame, exportIconFiles, openCardFile, saveCardFile, summarizeSlot,
} from './lib.js';

// Decimal or 0x-prefixed hex, rejected unless it is an integer in [0, max].
function parseNum(name: string, val: string, max: number): number {
  const s = val.trim();
  const n = /^0x[0-9a-f]+$/i.test(s) ? parseInt(s, 16) : /^[0-9]+$/.test(s) ? Number(s) : NaN;
  if (!Number.isSafeInteger(n) || n > max) throw new Error(`--${name} must be an integer in 0..${max}, got "${val}"`);
  return n;
}

const MAX_SLOT = DATA_BLOCKS - 1;
const MAX_FILESIZE = 0xffffffff;

// Split "--key value" pairs from positional arguments. A flag with no value reads as '1'.
function parseArgs(args: string[]): { positional: string[]; opts: Record<string, string> } {
  const opts: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i]!;
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      const val = (next && !next.startsWith('--')) ? args[++i]! : '1';
      opts[key] = val;
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

function printUsage() {
  console.log(`Usage:
  memcard info <card.mcr> [--text]
  memcard find <card.mcr> <term>
  memcard export <card.mcr> [--out dir] [--slot N]
  memcard resave <in.mcr> <out.mcr>
  memcard set-filesize <in.mcr> <out.mcr> --slot N --size BYTES

Examples:
  memcard info epsxe000.mcr
  memcard find epsxe000.mcr "wild arms"
  memcard export epsxe000.mcr --out tmp/icons --slot 0
`);
}

function requireArg(positional: string[], i: number, name: string): string {
  const v = positional[i];
  if (v === undefined) throw new Error(`missing <${name}>`);
  return v;
}

function slotRange(card: MemCard, opts: Record<string, string>): number[] {
  if (opts['slot'] !== undefined) return [parseNum('slot', opts['slot'], MAX_SLOT)];
  return card.data.map((_, i) => i);
}

function runInfo(args: string[]) {
  const { positional, opts } = parseArgs(args);
  const card = openCardFile(requireArg(positional, 0, 'card'));
  if (opts['text']) {
    card.info.dirFrames.forEach((d, slot) => {
      const db = card.data[slot];
      console.log(`Slot ${slot}:\n${describeDirectoryFrame(d)}${db ? `\n${describeTitleFrame(db.titleFrame)}` : ''}`);
    });
    return;
  }
  const badBlocks = card.info.brokenFrames.map((b) => b.brokenFrame).filter((n) => n !== 0xffffffff);
  console.log(JSON.stringify({
    command: 'info',
    headerId: Buffer.from(card.info.header.id).toString('latin1'),
    slots: card.data.map((_, slot) => summarizeSlot(card, slot)),
    badBlocks,
  }, null, 2));
}

function runFind(args: string[]) {
  const { positional } = parseArgs(args);
  const card = openCardFile(requireArg(positional, 0, 'card'));
  const term = requireArg(positional, 1, 'term');
  const slots = card.findSlots(term);
  for (const slot of slots) {
    const db = card.data[slot];
    if (db) console.log(`Slot ${slot}:\n${describeTitleFrame(db.titleFrame)}`);
  }
  if (slots.length === 0) console.log(`[find] no save matches "${term}"`);
}

function runExport(args: string[]) {
  const { positional, opts } = parseArgs(args);
  const card = openCardFile(requireArg(positional, 0, 'card'));
  const outDir = opts['out'] ?? '.';
  const explicit = opts['slot'] !== undefined;
  for (const slot of slotRange(card, opts)) {
    const db = card.data[slot];
    if (!db) throw new RangeError(`slot ${slot} out of range`);
    if (!explicit && !isAllocated(card.directory(slot))) continue;
    if (db.iconFrames.length === 0) {
      console.log(`[export] slot ${slot} has no icon frames`);
      continue;
    }
    for (const p of exportIconFiles(db, outDir, `slot${slot}`)) console.log(`[export] wrote ${p}`);
  }
}

function runResave(args: string[]) {
  const { positional } = parseArgs(args);
  const card = openCardFile(requireArg(positional, 0, 'in'));
  const out = requireArg(positional, 1, 'out');
  saveCardFile(card, out);
  console.log(`[resave] wrote ${out}`);
}

function runSetFilesize(args: string[]) {
  const { positional, opts } = parseArgs(args);
  if (opts['slot'] === undefined || opts['size'] === undefined) throw new Error('--slot and --size are required');
  const slot = parseNum('slot', opts['slot'], MAX_SLOT);
  const size = parseNum('size', opts['size'], MAX_FILESIZE);
  const card = openCardFile(requireArg(positional, 0, 'in'));
  const out = requireArg(positional, 1, 'out');
  const d = card.directory(slot);
  const before = d.filesize;
  d.filesize = size;
  saveCardFile(card, out);
  console.log(JSON.stringify({ command: 'set-filesize', slot, before, after: d.filesize, out }, null, 2));
}

function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  const rest = argv.slice(1);
  if (cmd === 'info') return runInfo(rest);
  if (cmd === 'find') return runFind(rest);
  if (cmd === 'export') return runExport(rest);
  if (cmd === 'resave') return runResave(rest);
  if (cmd === 'set-filesize') return runSetFilesize(rest);
  printUsage();
  process.exitCode = 1;
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
