/**
 * tagfill - run entry point
 *
 * Wires settings, logging, the HTTP client, both lookup sources, the
 * resolver and the batch processor together for one command-line run.
 * stdout carries the report; warnings and fatal messages go to stderr.
 */

import * as fs from 'fs';
import * as path from 'path';
import { HELP_TEXT, buildRunConfig, parseCliArgs } from './cliArgs';
import { scanDirectoryForAudioFiles } from './utils/fileScanner';
import { BatchProcessor } from './services/batchProcessor';
import { HttpClient } from './services/httpClient';
import { ItunesSource } from './services/itunesFetcher';
import { Logger } from './services/logger';
import type { LogSink } from './services/logger';
import { MusicBrainzSource } from './services/metadataFetcher';
import { Reporter } from './services/reporter';
import { Resolver } from './services/resolver';
import type { CandidateSource } from './services/resolver';
import { SettingsManager } from './services/settingsManager';
import { isPipelineError } from './services/errors';
import type { TagStoreOpener } from './services/tagStore';
import type { RunConfig } from '../shared/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Output streams of a run */
export interface RunIO {
  stdout: LogSink;
  stderr: LogSink;
}

/** Collaborators that can be swapped out (tests, embedding) */
export interface RunDependencies {
  /** Builds the ranked lookup sources. Defaults to iTunes then MusicBrainz */
  createSources?: (http: HttpClient, config: RunConfig, logger: Logger) => CandidateSource[];
  openTagStore?: TagStoreOpener;
  /** Aborting stops new dispatch; in-flight files finish */
  signal?: AbortSignal;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Default source chain: iTunes Search first, MusicBrainz + Cover Art Archive second */
export function createDefaultSources(http: HttpClient, config: RunConfig, logger: Logger): CandidateSource[] {
  return [
    new ItunesSource(http, { minImageBytes: config.minImageBytes.itunes, logger }),
    new MusicBrainzSource(http, { minImageBytes: config.minImageBytes.coverArtArchive, logger }),
  ];
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/** ".mp3" → "MP3" */
function extensionLabel(extension: string): string {
  return extension.replace(/^\./, '').toUpperCase();
}

// ─── Run ──────────────────────────────────────────────────────────────────────

/**
 * Runs one batch from command-line arguments.
 *
 * @param argv - Arguments without the node and script entries
 * @returns The process exit code: 1 only when no usable target directory was given
 */
export async function runCli(argv: readonly string[], io: RunIO, deps: RunDependencies = {}): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    io.stdout.write(HELP_TEXT);
    return 0;
  }

  for (const warning of args.warnings) {
    io.stderr.write(`[!] ${warning}\n`);
  }

  const settingsManager = new SettingsManager(args.settingsPath ? { filePath: args.settingsPath } : undefined);
  await settingsManager.initialize();
  const settingsProblem = settingsManager.getLoadProblem();
  if (settingsProblem) {
    io.stderr.write(`[!] ${settingsProblem}\n`);
  }

  let config: RunConfig;
  try {
    config = buildRunConfig(args, settingsManager.get());
  } catch (error: unknown) {
    if (!isPipelineError(error)) throw error;
    io.stderr.write(`[!] ${error.message}\n`);
    return 1;
  }

  if (!(await isDirectory(config.targetDir))) {
    io.stderr.write(`[!] Path does not exist: ${config.targetDir}\n`);
    return 1;
  }

  const logger = new Logger({
    logDir: config.logDir ?? undefined,
    writeToFile: config.logDir !== null,
    minLevel: config.verbose ? 'DEBUG' : 'INFO',
    echo: config.verbose ? io.stderr : null,
  });
  await logger.initialize();
  if (settingsProblem) {
    logger.warn(settingsProblem, { category: 'ConfigError', step: 'configuration' });
  }

  const files = scanDirectoryForAudioFiles(config.targetDir, {
    recursive: config.recursive,
    extension: config.extension,
  });
  if (files.length === 0) {
    io.stdout.write(`[i] No ${extensionLabel(config.extension)} files found.\n`);
    logger.info(`No ${config.extension} files in ${config.targetDir}`);
    return 0;
  }

  const reporter = new Reporter(io.stdout, config.dryRun);
  reporter.header(files.length, config);

  const http = new HttpClient({ ...config.http, logger });
  const sources = (deps.createSources ?? createDefaultSources)(http, config, logger);
  const processor = new BatchProcessor({
    config,
    resolver: new Resolver(sources, logger),
    openTagStore: deps.openTagStore,
    logger,
    onFileComplete: (result) => reporter.result(result),
  });

  const onAbort = (): void => processor.cancel();
  deps.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const outcome = await processor.process(files);
    reporter.summary(outcome.tally, files.length);
  } finally {
    deps.signal?.removeEventListener('abort', onAbort);
  }

  const logFile = logger.getSummary().logFilePath;
  if (logFile) {
    io.stderr.write(`[i] Log: ${path.resolve(logFile)}\n`);
  }
  return 0;
}
