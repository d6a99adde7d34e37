/**
 * Result Reporter
 *
 * Formats the stdout lines of a run: a header, one line per finished file
 * and a closing summary. Each line goes out in a single write so lines from
 * concurrent jobs never interleave.
 */

import type { FieldOutcome, RunConfig, StatusTally, WorkResult } from '../../shared/types';
import type { LogSink } from './logger';

// ─── Formatting ───────────────────────────────────────────────────────────────

/** ", album=set ('X'), year=kept ('2020')" for written and kept fields */
function appliedFieldExtras(fields: FieldOutcome[]): string {
  const extras: string[] = [];
  for (const outcome of fields) {
    if (outcome.value === null) continue;
    if (outcome.written) {
      extras.push(`${outcome.field}=set ('${outcome.value}')`);
    } else if (outcome.decision === 'keep') {
      extras.push(`${outcome.field}=kept ('${outcome.value}')`);
    }
  }
  return extras.length > 0 ? `, ${extras.join(', ')}` : '';
}

/** ", album would write 'X'" for every field a dry run would write */
function plannedFieldExtras(fields: FieldOutcome[]): string {
  const extras = fields
    .filter((outcome) => outcome.attempted && outcome.value !== null)
    .map((outcome) => `${outcome.field} would write '${outcome.value}'`);
  return extras.length > 0 ? `, ${extras.join(', ')}` : '';
}

/**
 * Formats the line printed for one finished file (without newline).
 */
export function formatResultLine(result: WorkResult): string {
  const source = result.source ?? 'unknown';
  switch (result.status) {
    case 'ok':
      return (
        `[OK] ${result.filePath} (${source}, wrote ${result.imageBytes} bytes` +
        `${result.detail ? `, ${result.detail}` : ''})${appliedFieldExtras(result.fields)}`
      );
    case 'found':
      return `[FOUND] ${result.filePath} (${source}, would embed ${result.imageBytes} bytes${plannedFieldExtras(result.fields)})`;
    case 'skip':
      return `[SKIP] ${result.filePath} (${result.detail ?? 'skipped'})${appliedFieldExtras(result.fields)}`;
    case 'miss':
      return `[MISS] ${result.filePath} (${result.detail ?? 'no cover/details found'})`;
    case 'error':
      return `[ERR] ${result.filePath} (${result.detail ?? 'unknown error'})`;
  }
}

/**
 * Formats the header printed before dispatch.
 */
export function formatHeader(fileCount: number, config: Pick<RunConfig, 'targetDir' | 'recursive' | 'dryRun' | 'force' | 'id3Version'>): string {
  return (
    `[i] Processing ${fileCount} file(s) in ${config.targetDir} (recursive=${config.recursive}) ` +
    `dry_run=${config.dryRun} force=${config.force} id3=v2.${config.id3Version}`
  );
}

/**
 * Formats the closing summary. `found` only appears for dry runs.
 */
export function formatSummary(tally: StatusTally, total: number, dryRun: boolean): string {
  const found = dryRun ? ` found=${tally.found}` : '';
  return `[i] Done. ok=${tally.ok} skip=${tally.skip} miss=${tally.miss} err=${tally.error}${found} of ${total}`;
}

// ─── Reporter ─────────────────────────────────────────────────────────────────

/**
 * Writes report lines to an output stream (stdout in the CLI).
 */
export class Reporter {
  constructor(
    private readonly out: LogSink,
    private readonly dryRun: boolean,
  ) {}

  line(text: string): void {
    this.out.write(`${text}\n`);
  }

  header(fileCount: number, config: RunConfig): void {
    this.line(formatHeader(fileCount, config));
  }

  result(result: WorkResult): void {
    this.line(formatResultLine(result));
  }

  summary(tally: StatusTally, total: number): void {
    this.out.write(`\n${formatSummary(tally, total, this.dryRun)}\n`);
  }
}
