import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { hasExtension, normalizeExtension, scanDirectoryForAudioFiles } from '../../../src/main/utils/fileScanner';

describe('fileScanner', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagfill-scan-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('normalizeExtension', () => {
    it('should lower-case and add a leading dot', () => {
      expect(normalizeExtension('MP3')).toBe('.mp3');
      expect(normalizeExtension('.Mp3')).toBe('.mp3');
      expect(normalizeExtension(' flac ')).toBe('.flac');
    });
  });

  describe('hasExtension', () => {
    it('should match case-insensitively', () => {
      expect(hasExtension('song.MP3', '.mp3')).toBe(true);
      expect(hasExtension('/music/a/song.mp3', '.mp3')).toBe(true);
    });

    it('should not match other or missing extensions', () => {
      expect(hasExtension('song.mp3.txt', '.mp3')).toBe(false);
      expect(hasExtension('mp3', '.mp3')).toBe(false);
    });
  });

  describe('scanDirectoryForAudioFiles', () => {
    beforeEach(() => {
      fs.writeFileSync(path.join(tempDir, 'b.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'A.MP3'), '');
      fs.writeFileSync(path.join(tempDir, 'notes.txt'), '');
      fs.mkdirSync(path.join(tempDir, 'sub', 'deeper'), { recursive: true });
      fs.writeFileSync(path.join(tempDir, 'sub', 'c.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'sub', 'deeper', 'd.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'sub', 'e.flac'), '');
    });

    it('should list only the top level by default, sorted', () => {
      expect(scanDirectoryForAudioFiles(tempDir)).toEqual([path.join(tempDir, 'A.MP3'), path.join(tempDir, 'b.mp3')]);
    });

    it('should descend into subdirectories when recursive', () => {
      expect(scanDirectoryForAudioFiles(tempDir, { recursive: true })).toEqual([
        path.join(tempDir, 'A.MP3'),
        path.join(tempDir, 'b.mp3'),
        path.join(tempDir, 'sub', 'c.mp3'),
        path.join(tempDir, 'sub', 'deeper', 'd.mp3'),
      ]);
    });

    it('should filter by the configured extension', () => {
      expect(scanDirectoryForAudioFiles(tempDir, { recursive: true, extension: 'FLAC' })).toEqual([
        path.join(tempDir, 'sub', 'e.flac'),
      ]);
    });

    it('should return [] for a directory that does not exist', () => {
      expect(scanDirectoryForAudioFiles(path.join(tempDir, 'missing'))).toEqual([]);
    });
  });
});
