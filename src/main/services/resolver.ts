/**
 * Resolver
 *
 * Picks at most one record per file with strict source precedence and no
 * cross-source scoring: the first candidate any source yields, in source
 * order, is accepted. Later sources are never consulted once an earlier
 * one produced something.
 */

import type { Logger } from './logger';
import type { Candidate, ResolvedRecord, TrackMeta } from '../../shared/types';

/** A ranked lookup source producing candidates lazily */
export interface CandidateSource {
  readonly name: string;
  /** Candidates in preference order. Must not throw. */
  candidates(meta: TrackMeta): AsyncIterable<Candidate>;
}

/**
 * Eager form of a source: every candidate it would yield, in order.
 * Downloads all artwork, so the resolver does not use it.
 */
export async function searchSource(source: CandidateSource, meta: TrackMeta): Promise<Candidate[]> {
  const all: Candidate[] = [];
  for await (const candidate of source.candidates(meta)) {
    all.push(candidate);
  }
  return all;
}

/**
 * Normalizes an accepted candidate: the genre list comes from `genres`,
 * else the single `genre`, else is empty.
 */
export function toResolvedRecord(candidate: Candidate): ResolvedRecord {
  const genres =
    candidate.genres && candidate.genres.length > 0
      ? [...candidate.genres]
      : candidate.genre
        ? [candidate.genre]
        : [];
  return { ...candidate, genres };
}

/**
 * Resolves a record from `sources`, tried in order.
 */
export class Resolver {
  constructor(
    private readonly sources: readonly CandidateSource[],
    private readonly logger: Logger | null = null,
  ) {}

  /**
   * @returns The accepted record, or null when no source yielded anything (a miss)
   */
  async resolve(meta: TrackMeta, filePath?: string): Promise<ResolvedRecord | null> {
    for (const source of this.sources) {
      for await (const candidate of source.candidates(meta)) {
        this.logger?.debug(`Accepted ${candidate.source} candidate`, { filePath, step: 'resolving' });
        return toResolvedRecord(candidate);
      }
      this.logger?.debug(`${source.name} yielded nothing`, { filePath, step: 'resolving' });
    }
    return null;
  }
}
