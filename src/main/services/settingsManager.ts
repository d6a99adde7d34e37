/**
 * Settings Manager Service for tagfill
 *
 * Loads persistent defaults from a JSON file stored at
 * %APPDATA%/tagfill/settings.json (Windows) or ~/.config/tagfill/settings.json
 * (other platforms), or from a file named with --settings. Command-line flags
 * override whatever is loaded here.
 *
 * Every field is validated on its own: an invalid value falls back to its
 * default and a corrupt file falls back to defaults entirely.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { APP_DIR_NAME } from './logger';
import { DEFAULT_SETTINGS, FIELD_NAMES } from '../../shared/types';
import type { AppSettings, HttpSettings, ImageFloors } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Directory holding the settings file. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Filename of the settings file. Defaults to 'settings.json' */
  fileName?: string;
  /** Explicit settings file; overrides settingsDir and fileName */
  filePath?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_SETTINGS_FILENAME = 'settings.json';

/** Upper bound for concurrent file jobs */
export const MAX_CONCURRENCY = 32;

// ─── Helper Functions ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Returns the default settings directory path based on the platform.
 * On Windows: %APPDATA%/tagfill/
 * On other platforms: ~/.config/tagfill/
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

/**
 * Validates a concurrency value and clamps it to the valid range (1-32).
 *
 * @returns The clamped concurrency value, or the default for non-numbers
 */
export function validateConcurrency(value: unknown): number {
  if (typeof value !== 'number' || isNaN(value)) {
    return DEFAULT_SETTINGS.concurrency;
  }
  return Math.max(1, Math.min(MAX_CONCURRENCY, Math.round(value)));
}

/**
 * Validates an ID3v2 minor version. Accepts 3, 4, "3", "4", "2.3" and "2.4".
 *
 * @returns The version, or null if the value is not one of those
 */
export function parseId3Version(value: unknown): 3 | 4 | null {
  const text = typeof value === 'number' ? String(value) : value;
  if (text === '3' || text === '2.3') return 3;
  if (text === '4' || text === '2.4') return 4;
  return null;
}

function positiveNumber(value: unknown, fallback: number, allowZero = false): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  if (value < 0 || (!allowZero && value === 0)) return fallback;
  return value;
}

function validateHttp(raw: unknown): HttpSettings {
  const defaults = DEFAULT_SETTINGS.http;
  if (!isRecord(raw)) return { ...defaults };
  return {
    timeoutMs: positiveNumber(raw.timeoutMs, defaults.timeoutMs),
    maxAttempts: Math.round(positiveNumber(raw.maxAttempts, defaults.maxAttempts)),
    baseDelayMs: positiveNumber(raw.baseDelayMs, defaults.baseDelayMs, true),
    backoffFactor: positiveNumber(raw.backoffFactor, defaults.backoffFactor),
    jitterMs: positiveNumber(raw.jitterMs, defaults.jitterMs, true),
    maxDelayMs: positiveNumber(raw.maxDelayMs, defaults.maxDelayMs, true),
  };
}

function validateFloors(raw: unknown): ImageFloors {
  const defaults = DEFAULT_SETTINGS.minImageBytes;
  if (!isRecord(raw)) return { ...defaults };
  return {
    itunes: Math.round(positiveNumber(raw.itunes, defaults.itunes, true)),
    coverArtArchive: Math.round(positiveNumber(raw.coverArtArchive, defaults.coverArtArchive, true)),
  };
}

/**
 * Validates and sanitizes a partial settings object, merging with defaults.
 * Returns a complete, valid AppSettings object.
 *
 * @param partial - A partial or potentially invalid settings object
 */
export function validateSettings(partial: unknown): AppSettings {
  const validated: AppSettings = {
    ...DEFAULT_SETTINGS,
    update: { ...DEFAULT_SETTINGS.update },
    http: { ...DEFAULT_SETTINGS.http },
    minImageBytes: { ...DEFAULT_SETTINGS.minImageBytes },
  };
  if (!isRecord(partial)) {
    return validated;
  }

  // concurrency: number (1-32)
  if (partial.concurrency !== undefined) {
    validated.concurrency = validateConcurrency(partial.concurrency);
  }

  // id3Version: 3 | 4
  const version = parseId3Version(partial.id3Version);
  if (version !== null) {
    validated.id3Version = version;
  }

  // extension: non-empty string, stored with a leading dot
  if (typeof partial.extension === 'string' && partial.extension.trim().replace(/^\./, '').length > 0) {
    const ext = partial.extension.trim().toLowerCase();
    validated.extension = ext.startsWith('.') ? ext : `.${ext}`;
  }

  // update: per-field booleans
  if (isRecord(partial.update)) {
    for (const field of FIELD_NAMES) {
      const flag = partial.update[field];
      if (typeof flag === 'boolean') {
        validated.update[field] = flag;
      }
    }
  }

  // logDir: string | null
  if (partial.logDir === null || typeof partial.logDir === 'string') {
    validated.logDir =
      typeof partial.logDir === 'string' && partial.logDir.trim().length > 0 ? partial.logDir.trim() : null;
  }

  // writeLogFile: boolean
  if (typeof partial.writeLogFile === 'boolean') {
    validated.writeLogFile = partial.writeLogFile;
  }

  if (partial.http !== undefined) {
    validated.http = validateHttp(partial.http);
  }

  if (partial.minImageBytes !== undefined) {
    validated.minImageBytes = validateFloors(partial.minImageBytes);
  }

  return validated;
}

/**
 * Parses a settings file body. Returns null if the JSON is invalid or not an object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Loads the settings file for a run.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize(); // Load settings from file (or use defaults)
 * const settings = manager.get();
 * ```
 */
export class SettingsManager {
  private settings: AppSettings;
  private readonly filePath: string;
  private initialized = false;
  private loadProblem: string | null = null;

  constructor(options?: SettingsManagerOptions) {
    this.filePath =
      options?.filePath ??
      path.join(options?.settingsDir ?? getDefaultSettingsDir(), options?.fileName ?? DEFAULT_SETTINGS_FILENAME);
    this.settings = validateSettings(undefined);
  }

  /**
   * Loads settings from file. A missing file silently means defaults; an
   * unreadable or corrupt one means defaults plus a load problem for the
   * caller to log.
   */
  async initialize(): Promise<void> {
    let content: string | null = null;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        this.loadProblem = `Cannot read settings file ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`;
      }
    }

    if (content !== null) {
      const parsed = deserializeSettings(content);
      if (parsed) {
        this.settings = validateSettings(parsed);
      } else {
        this.loadProblem = `Ignoring corrupt settings file ${this.filePath}`;
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Gets the current settings (copy to prevent mutation).
   */
  get(): AppSettings {
    return validateSettings(this.settings);
  }

  /**
   * Returns the full path to the settings file.
   */
  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Why the file was ignored, or null when it loaded (or simply did not exist).
   */
  getLoadProblem(): string | null {
    return this.loadProblem;
  }
}
