/**
 * Command-line parsing and RunConfig assembly.
 *
 * Flags override the settings file. Malformed values never abort the run:
 * they are reported as warnings and the setting keeps its previous value.
 * Only a missing target directory is fatal.
 */

import * as os from 'os';
import * as path from 'path';
import { ConfigError } from './services/errors';
import { getDefaultLogDir } from './services/logger';
import { parseId3Version, validateConcurrency } from './services/settingsManager';
import { normalizeExtension } from './utils/fileScanner';
import { FIELD_NAMES } from '../shared/types';
import type { AppSettings, FieldName, RunConfig } from '../shared/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Parsed command line, before settings are merged in */
export interface CliArgs {
  path: string | null;
  recursive: boolean;
  concurrency: number | null;
  dryRun: boolean;
  force: boolean;
  update: Partial<Record<FieldName, boolean>>;
  id3Version: 3 | 4 | null;
  extension: string | null;
  settingsPath: string | null;
  logDir: string | null;
  noLogFile: boolean;
  verbose: boolean;
  help: boolean;
  /** Problems found while parsing; the run continues */
  warnings: string[];
}

// ─── Constants ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `Usage: tagfill [-p] <dir> [options]

Find cover art and album details for MP3 files and write them into their ID3 tags.

Options:
  -p, --path <dir>         Folder containing the files (may also be given positionally)
  -r, --recursive          Scan subfolders
  -n, --concurrency <n>    Files processed in parallel (1-32, default 4)
      --dry-run            Search and report only; do not modify files
      --force              Replace existing cover art and, with --update-*, existing tags
      --update-album       Write album (TALB) when discovered, even if present*
      --update-year        Write release date (TDRC) when discovered, even if present*
      --update-genre       Write genre (TCON) when discovered, even if present*
      --update-artist      Write artist (TPE1) when discovered, even if present*
      --update-title       Write title (TIT2) when discovered, even if present*
      --update-track       Write track number (TRCK) when discovered, even if present*
      --id3-version <3|4>  Save tags as ID3v2.3 (default) or ID3v2.4
      --id3v24             Same as --id3-version 4
      --ext <.ext>         File extension to scan for (default .mp3)
      --settings <file>    Settings file (default ~/.config/tagfill/settings.json)
      --log-dir <dir>      Directory for daily log files
      --no-log-file        Do not write a log file
      --verbose            Mirror detailed log entries to stderr
  -h, --help               Show this help

* Existing values are only replaced together with --force. Missing values are always filled.
`;

const UPDATE_FLAGS: Record<string, FieldName> = Object.fromEntries(
  FIELD_NAMES.map((field) => [`--update-${field}`, field]),
);

/** Flags that take a value */
const VALUE_FLAGS = new Set([
  '-p',
  '--path',
  '-n',
  '--concurrency',
  '--id3-version',
  '--ext',
  '--settings',
  '--log-dir',
]);

// ─── Parsing ──────────────────────────────────────────────────────────────────

/**
 * Parses `argv` (without the node and script entries).
 * Supports `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
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
  };

  for (let index = 0; index < argv.length; index += 1) {
    let token = argv[index];
    let inlineValue: string | null = null;

    const eq = token.indexOf('=');
    if (token.startsWith('--') && eq > 0) {
      inlineValue = token.slice(eq + 1);
      token = token.slice(0, eq);
    }

    let value: string | null = null;
    if (VALUE_FLAGS.has(token)) {
      if (inlineValue !== null) {
        value = inlineValue;
      } else {
        const next = argv[index + 1];
        if (next === undefined || (next.startsWith('-') && next.length > 1)) {
          args.warnings.push(`Missing value for ${token}`);
          continue;
        }
        value = next;
        index += 1;
      }
    }

    switch (token) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '-p':
      case '--path':
        args.path = value;
        break;
      case '-r':
      case '--recursive':
        args.recursive = true;
        break;
      case '-n':
      case '--concurrency': {
        const parsed = Number(value);
        if (value === null || value.trim() === '' || !Number.isInteger(parsed)) {
          args.warnings.push(`Invalid --concurrency "${value ?? ''}"; using the configured value`);
        } else {
          args.concurrency = validateConcurrency(parsed);
        }
        break;
      }
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--force':
        args.force = true;
        break;
      case '--id3v24':
        args.id3Version = 4;
        break;
      case '--id3-version': {
        const version = parseId3Version(value);
        if (version === null) {
          args.warnings.push(`Invalid --id3-version "${value ?? ''}"; expected 3 or 4`);
        } else {
          args.id3Version = version;
        }
        break;
      }
      case '--ext':
        if (value !== null && value.trim().replace(/^\./, '').length > 0) {
          args.extension = normalizeExtension(value);
        } else {
          args.warnings.push('Invalid --ext; using the configured extension');
        }
        break;
      case '--settings':
        args.settingsPath = value;
        break;
      case '--log-dir':
        args.logDir = value;
        break;
      case '--no-log-file':
        args.noLogFile = true;
        break;
      case '--verbose':
        args.verbose = true;
        break;
      default:
        if (token in UPDATE_FLAGS) {
          args.update[UPDATE_FLAGS[token]] = true;
        } else if (!token.startsWith('-') && args.path === null) {
          args.path = token;
        } else {
          args.warnings.push(`Ignoring unknown argument: ${argv[index]}`);
        }
    }
  }

  return args;
}

/**
 * Expands a leading "~" and resolves `target` against the working directory.
 */
export function resolveTargetDir(target: string): string {
  const expanded = target === '~' || target.startsWith('~/') ? path.join(os.homedir(), target.slice(1)) : target;
  return path.resolve(expanded);
}

/**
 * Merges parsed arguments over loaded settings into the run's frozen config.
 *
 * @throws ConfigError when no target directory was given
 */
export function buildRunConfig(args: CliArgs, settings: AppSettings): RunConfig {
  if (args.path === null || args.path.trim() === '') {
    throw new ConfigError('A target directory is required (use -p <dir>)');
  }

  const update = { ...settings.update };
  for (const field of FIELD_NAMES) {
    if (args.update[field]) update[field] = true;
  }

  const logDir =
    args.noLogFile || !settings.writeLogFile ? null : (args.logDir ?? settings.logDir ?? getDefaultLogDir());

  return Object.freeze({
    targetDir: resolveTargetDir(args.path),
    recursive: args.recursive,
    extension: args.extension ?? normalizeExtension(settings.extension),
    concurrency: args.concurrency ?? settings.concurrency,
    dryRun: args.dryRun,
    force: args.force,
    update: Object.freeze(update),
    id3Version: args.id3Version ?? settings.id3Version,
    logDir,
    verbose: args.verbose,
    http: Object.freeze({ ...settings.http }),
    minImageBytes: Object.freeze({ ...settings.minImageBytes }),
  });
}
