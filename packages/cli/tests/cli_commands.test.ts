import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { openCardFile } from '../src/lib.js';
import { buildCardImage } from '../../core/tests/helpers/card_builder.js';

// Runs the CLI entry module with the given arguments, as `memcard <args>` would.
async function runCli(args: string[]): Promise<void> {
  process.argv = ['node', 'memcard', ...args];
  vi.resetModules();
  await import('../src/cli.js');
}

describe('memcard set-filesize', () => {
  let dir = '';
  let src = '';
  let dst = '';
  const savedArgv = process.argv;
  const savedExitCode = process.exitCode;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'memcard-cli-'));
    src = path.join(dir, 'in.mcr');
    dst = path.join(dir, 'out.mcr');
    writeFileSync(src, buildCardImage([{ slot: 0, title: 'Wild Arms' }, { slot: 2, title: 'Vagrant Story' }]));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.argv = savedArgv;
    process.exitCode = savedExitCode;
    rmSync(dir, { recursive: true, force: true });
  });

  function reportedError(): string {
    const err: unknown = vi.mocked(console.error).mock.calls[0]?.[0];
    return err instanceof Error ? err.message : String(err);
  }

  it('writes the new filesize into the chosen slot', async () => {
    await runCli(['set-filesize', src, dst, '--slot', '2', '--size', '0x4000']);
    expect(process.exitCode).toBe(savedExitCode);
    const card = openCardFile(dst);
    expect(card.info.dirFrames[2]!.filesize).toBe(0x4000);
    expect(card.info.dirFrames[0]!.filesize).toBe(0x2000);
  });

  it('rejects a slot that is not a number before writing anything', async () => {
    await runCli(['set-filesize', src, dst, '--slot', 'seven', '--size', '100']);
    expect(process.exitCode).toBe(1);
    expect(reportedError()).toBe('--slot must be an integer in 0..14, got "seven"');
    expect(existsSync(dst)).toBe(false);
  });

  it('rejects a slot past the last data block', async () => {
    await runCli(['set-filesize', src, dst, '--slot', '15', '--size', '100']);
    expect(process.exitCode).toBe(1);
    expect(reportedError()).toBe('--slot must be an integer in 0..14, got "15"');
    expect(existsSync(dst)).toBe(false);
  });

  it('rejects a negative size instead of wrapping it', async () => {
    await runCli(['set-filesize', src, dst, '--slot', '0', '--size', '-1']);
    expect(process.exitCode).toBe(1);
    expect(reportedError()).toBe('--size must be an integer in 0..4294967295, got "-1"');
    expect(existsSync(dst)).toBe(false);
  });

  it('rejects a size that does not fit in 32 bits', async () => {
    await runCli(['set-filesize', src, dst, '--slot', '0', '--size', '0x100000000']);
    expect(process.exitCode).toBe(1);
    expect(reportedError()).toBe('--size must be an integer in 0..4294967295, got "0x100000000"');
    expect(existsSync(dst)).toBe(false);
  });
});
