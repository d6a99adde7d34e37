/**
 * Batch Processing Service with Concurrency Control
 *
 * Runs one independent job per file through a bounded pool of async workers:
 * open tag store -> build request -> resolve -> write (or plan, in dry-run).
 * Jobs share nothing but the shared file index and the completion callback.
 * Every failure is caught at the job boundary and becomes that file's
 * "error" result; the rest of the batch carries on.
 *
 * Key design decisions:
 * - Configurable concurrency (1-32, default: 4)
 * - Graceful cancellation (in-flight files finish, no new file starts)
 * - Results are collected in completion order
 */

import * as path from 'path';
import { buildTrackMeta } from './requestBuilder';
import { applyRecord, planRecordWrite } from './tagWriter';
import { FrameListStore, openId3TagStore } from './tagStore';
import type { TagStore, TagStoreOpener } from './tagStore';
import { WriteError, wrapError } from './errors';
import type { Logger } from './logger';
import type { ResolvedRecord, RunConfig, StatusTally, TrackMeta, WorkResult } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Anything that turns a TrackMeta into at most one record */
export interface RecordResolver {
  resolve(meta: TrackMeta, filePath?: string): Promise<ResolvedRecord | null>;
}

/** Options for the batch processor */
export interface BatchProcessorOptions {
  config: RunConfig;
  resolver: RecordResolver;
  /** Opens a file's tag store. Defaults to the ID3 store */
  openTagStore?: TagStoreOpener;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Callback for individual file completion (called in completion order) */
  onFileComplete?: (result: WorkResult) => void;
}

/** Outcome of a whole batch */
export interface BatchOutcome {
  /** One result per processed file, in completion order */
  results: WorkResult[];
  tally: StatusTally;
  /** Files never started because the batch was cancelled */
  notStarted: number;
}

/** Internal state for tracking batch progress */
interface BatchState {
  totalFiles: number;
  tally: StatusTally;
  currentFiles: Set<string>;
  startTime: number;
  cancelled: boolean;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Empty view of a file whose tags could not be read. Planning only. */
class UnreadableTagStore extends FrameListStore {
  persist(): Promise<void> {
    return Promise.reject(new WriteError('tags could not be read', { filePath: this.filePath }));
  }
}

export function emptyTally(): StatusTally {
  return { ok: 0, skip: 0, miss: 0, error: 0, found: 0 };
}

function errorResult(filePath: string, detail: string, source: string | null = null): WorkResult {
  return { filePath, status: 'error', source, detail, imageBytes: 0, fields: [] };
}

// ─── BatchProcessor Class ────────────────────────────────────────────────────

export class BatchProcessor {
  private readonly config: RunConfig;
  private readonly concurrency: number;
  private readonly resolver: RecordResolver;
  private readonly openTagStore: TagStoreOpener;
  private readonly logger: Logger | null;
  private readonly onFileComplete: ((result: WorkResult) => void) | null;
  private state: BatchState | null = null;

  constructor(options: BatchProcessorOptions) {
    this.config = options.config;
    this.concurrency = Math.max(1, options.config.concurrency);
    this.resolver = options.resolver;
    this.openTagStore = options.openTagStore ?? openId3TagStore;
    this.logger = options.logger ?? null;
    this.onFileComplete = options.onFileComplete ?? null;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  /**
   * Returns whether the processor is currently running.
   */
  isRunning(): boolean {
    return this.state !== null && !this.state.cancelled;
  }

  /**
   * Cancels the current batch processing.
   * Files currently being processed will finish, but no new files will start.
   */
  cancel(): void {
    if (this.state && !this.state.cancelled) {
      this.state.cancelled = true;
      this.logger?.info('Batch processing cancelled; waiting for in-flight files');
    }
  }

  /**
   * Processes a batch of files with concurrency control.
   *
   * @param filePaths - Paths of the files to process
   * @returns Results in completion order plus per-status counts
   */
  async process(filePaths: string[]): Promise<BatchOutcome> {
    const state: BatchState = {
      totalFiles: filePaths.length,
      tally: emptyTally(),
      currentFiles: new Set(),
      startTime: Date.now(),
      cancelled: false,
    };
    this.state = state;

    this.logger?.info(
      `Starting batch processing: ${filePaths.length} files, concurrency: ${this.concurrency}, dry run: ${this.config.dryRun}`,
    );

    const results: WorkResult[] = [];

    let fileIndex = 0;
    const processNext = async (): Promise<void> => {
      while (fileIndex < filePaths.length) {
        if (state.cancelled) {
          break;
        }

        const filePath = filePaths[fileIndex++];
        state.currentFiles.add(filePath);

        let result: WorkResult;
        try {
          result = await this.processFile(filePath);
        } catch (error: unknown) {
          // processFile catches everything; this guards the job boundary
          const message = error instanceof Error ? error.message : String(error);
          this.logger?.error(`Unexpected error processing ${path.basename(filePath)}: ${message}`, { filePath });
          result = errorResult(filePath, message);
        } finally {
          state.currentFiles.delete(filePath);
        }

        results.push(result);
        state.tally[result.status]++;
        this.emit(result);
      }
    };

    // Launch concurrent workers
    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(this.concurrency, filePaths.length); i++) {
      workers.push(processNext());
    }
    await Promise.all(workers);

    const notStarted = filePaths.length - fileIndex;
    const elapsed = Date.now() - state.startTime;
    const { ok, skip, miss, error, found } = state.tally;
    this.logger?.info(
      `Batch processing complete: ${ok} ok, ${skip} skipped, ${miss} missed, ${error} errors, ${found} found in ${(elapsed / 1000).toFixed(1)}s` +
        (notStarted > 0 ? ` (${notStarted} not started)` : ''),
    );

    this.state = null;
    return { results, tally: { ...state.tally }, notStarted };
  }

  /**
   * Processes a single file: read tags, resolve, then write or plan.
   * Never throws; every failure becomes an "error" result.
   */
  async processFile(filePath: string): Promise<WorkResult> {
    const name = path.basename(filePath);
    try {
      this.logger?.info(`Processing: ${name}`, { filePath, step: 'reading' });

      let store: TagStore | null = null;
      try {
        store = await this.openTagStore(filePath);
      } catch (error: unknown) {
        const wrapped = wrapError(error, 'FileReadError', { filePath, step: 'reading' });
        this.logger?.logPipelineError(wrapped, 'WARN');
      }

      const meta = buildTrackMeta(filePath, store);
      this.logger?.info(
        `Resolving: artist=${meta.artist ?? '-'} album=${meta.album ?? '-'} title=${meta.title ?? '-'}`,
        { filePath, step: 'resolving' },
      );

      const record = await this.resolver.resolve(meta, filePath);
      if (!record) {
        this.logger?.logSkippedFile(filePath, 'no cover/details found');
        return { filePath, status: 'miss', source: null, detail: 'no cover/details found', imageBytes: 0, fields: [] };
      }

      if (this.config.dryRun) {
        // Unreadable files plan against an empty view: every discovered field is a write
        const plan = planRecordWrite(store ?? new UnreadableTagStore(filePath), record, this.config);
        this.logger?.info(`Found (dry run): ${record.source}`, { filePath, step: 'planning' });
        return {
          filePath,
          status: 'found',
          source: record.source,
          detail: null,
          imageBytes: plan.imageBytes,
          fields: plan.fields,
        };
      }

      return await this.write(filePath, store ?? (await this.openForWrite(filePath)), record);
    } catch (error: unknown) {
      this.logger?.logError(error, { filePath, step: 'processing' });
      return errorResult(filePath, error instanceof Error ? error.message : String(error));
    }
  }

  private async write(filePath: string, store: TagStore, record: ResolvedRecord): Promise<WorkResult> {
    this.logger?.info(`Writing tags: ${path.basename(filePath)}`, { filePath, step: 'writing' });
    const written = await applyRecord(store, record, this.config);

    if (!written.success) {
      this.logger?.error(`Tag write failed: ${written.error ?? 'unknown error'}`, {
        category: 'WriteError',
        filePath,
        step: 'writing',
      });
      return errorResult(filePath, `write failed: ${written.error ?? 'unknown error'}`, record.source);
    }

    const { plan } = written;
    if (plan.image === 'keep') {
      this.logger?.logSkippedFile(filePath, 'already has art');
      return {
        filePath,
        status: 'skip',
        source: record.source,
        detail: 'already has art',
        imageBytes: 0,
        fields: plan.fields,
      };
    }

    this.logger?.info(
      `Completed: ${record.source}${written.persisted ? '' : ' (no changes)'}`,
      { filePath, step: 'writing' },
    );
    return {
      filePath,
      status: 'ok',
      source: record.source,
      detail: record.image ? null : 'no image to embed',
      imageBytes: plan.imageBytes,
      fields: plan.fields,
    };
  }

  /**
   * Re-opens a store that failed to open before resolving. A second failure
   * propagates and is reported as the file's error.
   */
  private async openForWrite(filePath: string): Promise<TagStore> {
    try {
      return await this.openTagStore(filePath);
    } catch (error: unknown) {
      throw wrapError(error, 'FileReadError', { filePath, step: 'reading' });
    }
  }

  private emit(result: WorkResult): void {
    if (!this.onFileComplete) return;
    try {
      this.onFileComplete(result);
    } catch (error: unknown) {
      this.logger?.logError(error, { filePath: result.filePath, step: 'reporting' });
    }
  }
}
