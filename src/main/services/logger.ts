/**
 * Logger Service for tagfill
 *
 * Structured logging with daily log files, log levels, error categorization
 * and PipelineError integration. stdout belongs to the reporter, so the
 * logger only ever writes to its file and, when verbose, to stderr.
 *
 * Log levels: ERROR (failed files), WARN (skips and misses), INFO (progress),
 * DEBUG (individual lookups and retries)
 *
 * Default log directory: %APPDATA%/tagfill/logs/ (~/.config/tagfill/logs/ elsewhere)
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, isPipelineError } from './errors';
import type { ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** File being processed when the log was created (if applicable) */
  filePath: string | null;
  /** Processing step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Context accepted by the level methods */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Minimal writable target used for the verbose mirror */
export interface LogSink {
  write(chunk: string): unknown;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to the platform app-data directory */
  logDir?: string;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Mirror every recorded entry to this sink (stderr in verbose mode) */
  echo?: LogSink | null;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Summary of log entries */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  debugCount: number;
  /** Breakdown of errors by category */
  errorsByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  /** Filter by file path (substring match) */
  filePath?: string;
  /** Maximum number of entries to return (most recent) */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

/** Default app data directory name */
export const APP_DIR_NAME = 'tagfill';

const LOG_DIR_NAME = 'logs';

/** Default maximum log file size (10MB) */
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Log level numeric values for comparison */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path based on the platform.
 * On Windows: %APPDATA%/tagfill/logs/
 * On other platforms: ~/.config/tagfill/logs/
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single-line string for file output.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.filePath) {
    parts.push(`| filePath: ${entry.filePath}`);
  }

  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }

  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 *
 * @param level - The log level (defaults to ERROR)
 * @param getCurrentDate - Optional function to get current date (for testing)
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    filePath: error.filePath,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a generic message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    filePath: options?.filePath ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for tagfill runs.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.info('Resolving', { filePath: '/music/song.mp3', step: 'resolving' });
 * logger.logPipelineError(new WriteError('disk full', { filePath: '/music/song.mp3' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly writeToFile: boolean;
  private readonly maxFileSize: number;
  private readonly echo: LogSink | null;
  private readonly getCurrentDate: () => Date;

  /** In-memory log entries for the current run */
  private entries: LogEntry[] = [];

  /** Whether the logger has been initialized (log directory created) */
  private initialized = false;

  /** Set when the log directory could not be created */
  private fileDisabled = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.echo = options?.echo ?? null;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If writeToFile is false this is a no-op.
   * A directory that cannot be created disables file logging for the run.
   */
  async initialize(): Promise<void> {
    if (!this.writeToFile) {
      this.initialized = true;
      return;
    }

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
    } catch (error: unknown) {
      this.fileDisabled = true;
      const message = error instanceof Error ? error.message : String(error);
      this.warn(`Failed to create log directory "${this.logDir}": ${message}. File logging disabled.`);
    }
    this.initialized = true;
  }

  /**
   * Returns the current log file path based on today's date.
   */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  getLogDir(): string {
    return this.logDir;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  debug(message: string, options?: LogContext): void {
    this.log('DEBUG', message, options);
  }

  /**
   * Logs a PipelineError with its category, file, step and cause.
   *
   * @param level - Log level override (defaults to ERROR)
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any error. PipelineErrors keep their context; anything else
   * becomes a plain ERROR entry.
   */
  logError(
    error: unknown,
    context?: {
      filePath?: string;
      step?: string;
    },
  ): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.error(message, {
      filePath: context?.filePath,
      step: context?.step,
    });
  }

  /**
   * Logs a skipped file (WARN level).
   */
  logSkippedFile(filePath: string, reason: string): void {
    this.warn(`File skipped: ${reason}`, {
      filePath,
      step: 'processing',
    });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    const formatted = formatLogEntry(entry) + '\n';
    this.echo?.write(formatted);
    if (this.writeToFile && this.initialized && !this.fileDisabled) {
      this.writeEntryToFile(formatted);
    }
  }

  /**
   * Appends a formatted line to the current log file, rotating first when the
   * file has reached maxFileSize. Write errors disable file logging for the
   * rest of the run instead of failing the file being processed.
   */
  private writeEntryToFile(formatted: string): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.appendFileSync(logFilePath, formatted, 'utf-8');
    } catch (error: unknown) {
      this.fileDisabled = true;
      const message = error instanceof Error ? error.message : String(error);
      this.echo?.write(`log file disabled: ${message}\n`);
    }
  }

  /**
   * Rotates a log file by renaming it with the next free numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /**
   * Returns all in-memory log entries, optionally filtered.
   */
  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }

    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }

    if (filter?.filePath) {
      const search = filter.filePath.toLowerCase();
      entries = entries.filter((e) => e.filePath !== null && e.filePath.toLowerCase().includes(search));
    }

    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  /**
   * Returns a summary of the current log state.
   */
  getSummary(): LogSummary {
    const errorsByCategory: Record<string, number> = {};
    const counts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0, DEBUG: 0 };

    for (const entry of this.entries) {
      counts[entry.level]++;
      if (entry.level === 'ERROR' && entry.category) {
        errorsByCategory[entry.category] = (errorsByCategory[entry.category] || 0) + 1;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount: counts.ERROR,
      warnCount: counts.WARN,
      infoCount: counts.INFO,
      debugCount: counts.DEBUG,
      errorsByCategory,
      logFilePath: this.writeToFile && !this.fileDisabled ? this.getLogFilePath() : null,
    };
  }

  get size(): number {
    return this.entries.length;
  }
}
