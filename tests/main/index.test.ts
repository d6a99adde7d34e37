import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runCli } from '../../src/main/index';
import type { RunIO } from '../../src/main/index';
import { HELP_TEXT } from '../../src/main/cliArgs';
import type { CandidateSource } from '../../src/main/services/resolver';
import type { Candidate, TrackMeta } from '../../src/shared/types';
import { MemoryTagStore, fakeSource, makeCandidate, memoryOpener } from '../helpers/fakes';

// ─── Test Helpers ────────────────────────────────────────────────────────

function captureIO(): RunIO & { out: () => string; err: () => string } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
    out: () => stdout.join(''),
    err: () => stderr.join(''),
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe('runCli', () => {
  let tempDir: string;
  let musicDir: string;
  let settingsArgs: string[];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagfill-run-test-'));
    musicDir = path.join(tempDir, 'music');
    fs.mkdirSync(musicDir);
    settingsArgs = ['--settings', path.join(tempDir, 'settings.json'), '--no-log-file'];
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should print help and exit 0', async () => {
    const io = captureIO();

    expect(await runCli(['--help'], io)).toBe(0);
    expect(io.out()).toBe(HELP_TEXT);
    expect(io.err()).toBe('');
  });

  it('should exit 1 without a target directory', async () => {
    const io = captureIO();

    expect(await runCli(settingsArgs, io)).toBe(1);
    expect(io.err()).toBe('[!] A target directory is required (use -p <dir>)\n');
  });

  it('should exit 1 when the directory does not exist', async () => {
    const io = captureIO();
    const missing = path.join(tempDir, 'missing');

    expect(await runCli(['-p', missing, ...settingsArgs], io)).toBe(1);
    expect(io.err()).toBe(`[!] Path does not exist: ${missing}\n`);
  });

  it('should report warnings and a corrupt settings file on stderr', async () => {
    const settingsPath = path.join(tempDir, 'settings.json');
    fs.writeFileSync(settingsPath, '{oops');
    const io = captureIO();

    expect(await runCli(['-p', musicDir, '--settings', settingsPath, '--no-log-file', '--bogus'], io)).toBe(0);
    expect(io.err()).toBe(
      `[!] Ignoring unknown argument: --bogus\n[!] Ignoring corrupt settings file ${settingsPath}\n`,
    );
  });

  it('should say so when no files match', async () => {
    fs.writeFileSync(path.join(musicDir, 'cover.jpg'), '');
    const io = captureIO();

    expect(await runCli(['-p', musicDir, ...settingsArgs], io)).toBe(0);
    expect(io.out()).toBe('[i] No MP3 files found.\n');
  });

  describe('with files', () => {
    let fileOne: string;
    let fileTwo: string;
    let stores: Map<string, MemoryTagStore>;

    beforeEach(() => {
      fileOne = path.join(musicDir, 'Artist - One.mp3');
      fileTwo = path.join(musicDir, 'Artist - Two.mp3');
      fs.writeFileSync(fileOne, '');
      fs.writeFileSync(fileTwo, '');
      stores = new Map([
        [fileOne, new MemoryTagStore(fileOne)],
        [fileTwo, new MemoryTagStore(fileTwo)],
      ]);
    });

    it('should write tags and print one line per file', async () => {
      const source = fakeSource('iTunes', [makeCandidate({ albumTitle: 'Album X' })]);
      const io = captureIO();

      const code = await runCli(['-p', musicDir, '-n', '1', ...settingsArgs], io, {
        createSources: () => [source],
        openTagStore: memoryOpener(new Map(stores)),
      });

      expect(code).toBe(0);
      expect(io.out()).toBe(
        `[i] Processing 2 file(s) in ${musicDir} (recursive=false) dry_run=false force=false id3=v2.3\n` +
          `[OK] ${fileOne} (iTunes 1200px, wrote 30000 bytes), album=set ('Album X')\n` +
          `[OK] ${fileTwo} (iTunes 1200px, wrote 30000 bytes), album=set ('Album X')\n` +
          '\n[i] Done. ok=2 skip=0 miss=0 err=0 of 2\n',
      );
      expect(source.seen).toEqual([
        { artist: 'Artist', album: null, title: 'One' },
        { artist: 'Artist', album: null, title: 'Two' },
      ]);
      expect(stores.get(fileOne)?.persistCount).toBe(1);
      expect(stores.get(fileTwo)?.persistedVersions).toEqual([3]);
      expect(io.err()).toBe('');
    });

    it('should only report in a dry run', async () => {
      const io = captureIO();

      await runCli(['-p', musicDir, '-n', '1', '--dry-run', '--id3v24', ...settingsArgs], io, {
        createSources: () => [fakeSource('iTunes', [makeCandidate({ albumTitle: 'Album X' })])],
        openTagStore: memoryOpener(new Map(stores)),
      });

      expect(io.out()).toBe(
        `[i] Processing 2 file(s) in ${musicDir} (recursive=false) dry_run=true force=false id3=v2.4\n` +
          `[FOUND] ${fileOne} (iTunes 1200px, would embed 30000 bytes, album would write 'Album X')\n` +
          `[FOUND] ${fileTwo} (iTunes 1200px, would embed 30000 bytes, album would write 'Album X')\n` +
          '\n[i] Done. ok=0 skip=0 miss=0 err=0 found=2 of 2\n',
      );
      expect(stores.get(fileOne)?.persistCount).toBe(0);
      expect(stores.get(fileTwo)?.persistCount).toBe(0);
    });

    it('should report misses', async () => {
      const io = captureIO();

      await runCli(['-p', musicDir, '-n', '1', ...settingsArgs], io, {
        createSources: () => [fakeSource('iTunes', [])],
        openTagStore: memoryOpener(new Map(stores)),
      });

      expect(io.out().split('\n').slice(1)).toEqual([
        `[MISS] ${fileOne} (no cover/details found)`,
        `[MISS] ${fileTwo} (no cover/details found)`,
        '',
        '[i] Done. ok=0 skip=0 miss=2 err=0 of 2',
        '',
      ]);
    });

    it('should stop dispatching once the signal aborts', async () => {
      const controller = new AbortController();
      const abortingSource: CandidateSource = {
        name: 'iTunes',
        async *candidates(_meta: TrackMeta): AsyncGenerator<Candidate> {
          controller.abort();
          yield makeCandidate({ albumTitle: 'Album X' });
        },
      };
      const io = captureIO();

      await runCli(['-p', musicDir, '-n', '1', ...settingsArgs], io, {
        createSources: () => [abortingSource],
        openTagStore: memoryOpener(new Map(stores)),
        signal: controller.signal,
      });

      expect(io.out().split('\n').slice(1)).toEqual([
        `[OK] ${fileOne} (iTunes 1200px, wrote 30000 bytes), album=set ('Album X')`,
        '',
        '[i] Done. ok=1 skip=0 miss=0 err=0 of 2',
        '',
      ]);
      expect(stores.get(fileTwo)?.persistCount).toBe(0);
    });
  });
});
