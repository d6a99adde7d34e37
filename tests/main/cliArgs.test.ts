import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { buildRunConfig, parseCliArgs, resolveTargetDir } from '../../src/main/cliArgs';
import { ConfigError } from '../../src/main/services/errors';
import { getDefaultLogDir } from '../../src/main/services/logger';
import { MAX_CONCURRENCY, validateSettings } from '../../src/main/services/settingsManager';

describe('cliArgs', () => {
  describe('parseCliArgs', () => {
    it('should return defaults for an empty command line', () => {
      expect(parseCliArgs([])).toEqual({
        path: null,
        recursive: false,
        concurrency: null,
        dryRun: false,
        force: false,
        update: {},
        id3Version: null,
        extension: null,
        settingsPath: null,
        logDir: null,
        noLogFile: false,
        verbose: false,
        help: false,
        warnings: [],
      });
    });

    it('should parse short and long flags with separate values', () => {
      const args = parseCliArgs(['-p', '/music', '-r', '-n', '8', '--dry-run', '--force', '--verbose']);

      expect(args.path).toBe('/music');
      expect(args.recursive).toBe(true);
      expect(args.concurrency).toBe(8);
      expect(args.dryRun).toBe(true);
      expect(args.force).toBe(true);
      expect(args.verbose).toBe(true);
      expect(args.warnings).toEqual([]);
    });

    it('should accept --flag=value', () => {
      const args = parseCliArgs(['--path=/music', '--concurrency=2', '--id3-version=2.4', '--ext=FLAC', '--log-dir=/tmp/logs']);

      expect(args.path).toBe('/music');
      expect(args.concurrency).toBe(2);
      expect(args.id3Version).toBe(4);
      expect(args.extension).toBe('.flac');
      expect(args.logDir).toBe('/tmp/logs');
    });

    it('should take the first bare argument as the path', () => {
      const args = parseCliArgs(['/music', '--id3v24', 'extra']);

      expect(args.path).toBe('/music');
      expect(args.id3Version).toBe(4);
      expect(args.warnings).toEqual(['Ignoring unknown argument: extra']);
    });

    it('should collect update flags', () => {
      const args = parseCliArgs(['--update-album', '--update-track', '--update-genre']);
      expect(args.update).toEqual({ album: true, track: true, genre: true });
    });

    it('should clamp concurrency into range', () => {
      expect(parseCliArgs(['-n', '0']).concurrency).toBe(1);
      expect(parseCliArgs(['-n', '500']).concurrency).toBe(MAX_CONCURRENCY);
    });

    it('should warn about malformed values and keep going', () => {
      const args = parseCliArgs(['-n', 'many', '--id3-version', '5', '--ext', '.', '--bogus', '-p', '/music']);

      expect(args.concurrency).toBeNull();
      expect(args.id3Version).toBeNull();
      expect(args.extension).toBeNull();
      expect(args.path).toBe('/music');
      expect(args.warnings).toEqual([
        'Invalid --concurrency "many"; using the configured value',
        'Invalid --id3-version "5"; expected 3 or 4',
        'Invalid --ext; using the configured extension',
        'Ignoring unknown argument: --bogus',
      ]);
    });

    it('should warn when a value is missing', () => {
      const args = parseCliArgs(['-p', '--force']);

      expect(args.path).toBeNull();
      expect(args.force).toBe(true);
      expect(args.warnings).toEqual(['Missing value for -p']);
    });

    it('should recognise help', () => {
      expect(parseCliArgs(['-h']).help).toBe(true);
      expect(parseCliArgs(['--help']).help).toBe(true);
    });
  });

  describe('resolveTargetDir', () => {
    it('should expand the home directory', () => {
      expect(resolveTargetDir('~/Music')).toBe(path.join(os.homedir(), 'Music'));
      expect(resolveTargetDir('~')).toBe(os.homedir());
    });

    it('should resolve relative paths against the working directory', () => {
      expect(resolveTargetDir('music')).toBe(path.resolve('music'));
    });
  });

  describe('buildRunConfig', () => {
    it('should require a target directory', () => {
      expect(() => buildRunConfig(parseCliArgs(['--force']), validateSettings({}))).toThrow(ConfigError);
    });

    it('should let flags override settings', () => {
      const settings = validateSettings({ concurrency: 6, id3Version: 4, extension: 'm4a', logDir: '/var/log/tagfill' });
      const config = buildRunConfig(parseCliArgs(['/music', '-n', '2', '--id3-version', '3', '--ext', 'mp3']), settings);

      expect(config.concurrency).toBe(2);
      expect(config.id3Version).toBe(3);
      expect(config.extension).toBe('.mp3');
      expect(config.logDir).toBe('/var/log/tagfill');
    });

    it('should fall back to settings when flags are absent', () => {
      const settings = validateSettings({ concurrency: 6, id3Version: 4, extension: 'm4a', update: { year: true } });
      const config = buildRunConfig(parseCliArgs(['/music', '--update-album']), settings);

      expect(config.targetDir).toBe(path.resolve('/music'));
      expect(config.concurrency).toBe(6);
      expect(config.id3Version).toBe(4);
      expect(config.extension).toBe('.m4a');
      expect(config.update).toEqual({ album: true, year: true, genre: false, artist: false, title: false, track: false });
      expect(config.logDir).toBe(getDefaultLogDir());
    });

    it('should disable the log file from either source', () => {
      expect(buildRunConfig(parseCliArgs(['/music', '--no-log-file']), validateSettings({})).logDir).toBeNull();
      expect(buildRunConfig(parseCliArgs(['/music', '--log-dir', '/tmp/x']), validateSettings({ writeLogFile: false })).logDir).toBeNull();
    });

    it('should return a frozen config', () => {
      const config = buildRunConfig(parseCliArgs(['/music']), validateSettings({}));

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.update)).toBe(true);
    });
  });
});
