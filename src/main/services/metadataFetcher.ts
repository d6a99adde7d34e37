/**
 * MusicBrainz Metadata Source
 *
 * The second-ranked lookup, used only when iTunes yields nothing. Stage 1
 * resolves a release id by searching releases (artist + album), falling back
 * to a recording search (artist + title). Stage 2 fetches the release's date
 * and genres and asks the Cover Art Archive for its front cover.
 *
 * A resolved release always produces a candidate, with or without an image,
 * so date/genre/album can still be written.
 */

import { fetchCoverArtArchiveImage } from './albumArtFetcher';
import type { HttpClient } from './httpClient';
import type { Logger } from './logger';
import type { CandidateSource } from './resolver';
import type { Candidate, TrackMeta } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Release id and title found by stage 1 */
export interface ReleaseRef {
  id: string;
  title: string | null;
}

/** Descriptive details of a release */
export interface ReleaseDetails {
  title: string | null;
  date: string | null;
  /** Genre names, most relevant first */
  genres: string[];
}

/** Tag or genre entry from MusicBrainz API */
interface MBTag {
  name: string;
  count: number;
}

/** Options for the MusicBrainz source */
export interface MetadataFetcherOptions {
  /** Minimum accepted Cover Art Archive image size in bytes */
  minImageBytes: number;
  /** MusicBrainz API base URL (for testing) */
  apiBaseUrl?: string;
  /** Cover Art Archive base URL (for testing) */
  caaBaseUrl?: string;
  logger?: Logger | null;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const MUSICBRAINZ_API_URL = 'https://musicbrainz.org/ws/2';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function firstRecord(value: unknown): Record<string, unknown> | null {
  return Array.isArray(value) && isRecord(value[0]) ? value[0] : null;
}

/**
 * Escapes a value for use inside a quoted Lucene phrase.
 * e.g. `AC"DC` → `AC\"DC`
 */
export function escapeLucene(value: string): string {
  return value.replace(/["\\]/g, '\\$&');
}

/**
 * Builds the release search query. Returns null without an album.
 */
export function buildReleaseQuery(meta: TrackMeta): string | null {
  if (!meta.album) return null;
  const release = `release:"${escapeLucene(meta.album)}"`;
  return meta.artist ? `artist:"${escapeLucene(meta.artist)}" AND ${release}` : release;
}

/**
 * Builds the recording search query. Returns null unless both artist and title are known.
 */
export function buildRecordingQuery(meta: TrackMeta): string | null {
  if (!meta.artist || !meta.title) return null;
  return `artist:"${escapeLucene(meta.artist)}" AND recording:"${escapeLucene(meta.title)}"`;
}

function toReleaseRef(release: Record<string, unknown> | null): ReleaseRef | null {
  if (!release || typeof release.id !== 'string' || release.id.length === 0) return null;
  return { id: release.id, title: typeof release.title === 'string' ? release.title : null };
}

/** First release of a `/release?query=` response */
export function parseReleaseSearch(body: unknown): ReleaseRef | null {
  return isRecord(body) ? toReleaseRef(firstRecord(body.releases)) : null;
}

/** First release of the first recording of a `/recording?query=` response */
export function parseRecordingSearch(body: unknown): ReleaseRef | null {
  if (!isRecord(body)) return null;
  const recording = firstRecord(body.recordings);
  return recording ? toReleaseRef(firstRecord(recording.releases)) : null;
}

function parseTags(value: unknown): MBTag[] {
  if (!Array.isArray(value)) return [];
  const tags: MBTag[] = [];
  for (const entry of value) {
    if (isRecord(entry) && typeof entry.name === 'string' && entry.name.trim().length > 0) {
      tags.push({ name: entry.name.trim(), count: typeof entry.count === 'number' ? entry.count : 0 });
    }
  }
  return tags;
}

/**
 * Capitalizes a genre name.
 * Handles common genre formats like "hip hop" -> "Hip Hop",
 * "r&b" -> "R&B", "post-punk" -> "Post-Punk".
 */
export function capitalizeGenre(genre: string): string {
  return genre
    .split(/(\s+|-|&)/)
    .map((part) => {
      if (part === '&' || part === '-' || /^\s+$/.test(part)) return part;
      return part.charAt(0).toUpperCase() + part.slice(1);
    })
    .join('');
}

/**
 * Picks genre names: curated genres in listed order, or when there are none,
 * free-text tags ordered by vote count (highest first).
 */
export function extractGenres(genres: unknown, tags: unknown): string[] {
  const curated = parseTags(genres);
  if (curated.length > 0) {
    return curated.map((genre) => capitalizeGenre(genre.name));
  }
  return parseTags(tags)
    .sort((a, b) => b.count - a.count)
    .map((tag) => capitalizeGenre(tag.name));
}

/** Maps a `/release/<id>?inc=genres+tags` response to ReleaseDetails */
export function parseReleaseDetails(body: unknown): ReleaseDetails {
  if (!isRecord(body)) return { title: null, date: null, genres: [] };
  return {
    title: typeof body.title === 'string' ? body.title : null,
    date: typeof body.date === 'string' && body.date.length > 0 ? body.date : null,
    genres: extractGenres(body.genres, body.tags),
  };
}

// ─── Source ──────────────────────────────────────────────────────────────────

/**
 * Lookup source backed by MusicBrainz and the Cover Art Archive.
 *
 * Usage:
 * ```typescript
 * const mb = new MusicBrainzSource(http, { minImageBytes: 20_000 });
 * for await (const candidate of mb.candidates(meta)) { ... }
 * ```
 */
export class MusicBrainzSource implements CandidateSource {
  readonly name = 'MusicBrainz';
  private readonly apiUrl: string;
  private readonly options: MetadataFetcherOptions;
  private readonly logger: Logger | null;

  constructor(
    private readonly http: HttpClient,
    options: MetadataFetcherOptions,
  ) {
    this.apiUrl = options.apiBaseUrl ?? MUSICBRAINZ_API_URL;
    this.options = options;
    this.logger = options.logger ?? null;
  }

  /**
   * Yields at most one candidate: the resolved release with its details and
   * cover (image may be null). Never throws.
   */
  async *candidates(meta: TrackMeta): AsyncGenerator<Candidate> {
    const release = await this.findRelease(meta);
    if (!release) return;

    const details = await this.fetchReleaseDetails(release.id);
    const image = await fetchCoverArtArchiveImage(this.http, release.id, {
      minBytes: this.options.minImageBytes,
      caaBaseUrl: this.options.caaBaseUrl,
      logger: this.logger,
    });

    yield {
      image,
      source: image ? 'CoverArtArchive' : 'MusicBrainz',
      albumTitle: release.title ?? details.title ?? undefined,
      releaseDate: details.date ?? undefined,
      genres: details.genres,
      artistName: meta.artist ?? undefined,
      trackTitle: meta.title ?? undefined,
    };
  }

  /**
   * Stage 1: release search, then recording search.
   *
   * @returns The release, or null when neither search matched
   */
  async findRelease(meta: TrackMeta): Promise<ReleaseRef | null> {
    const releaseQuery = buildReleaseQuery(meta);
    if (releaseQuery) {
      const release = parseReleaseSearch(await this.search('release', releaseQuery));
      if (release) return release;
    }

    const recordingQuery = buildRecordingQuery(meta);
    if (recordingQuery) {
      return parseRecordingSearch(await this.search('recording', recordingQuery, 'releases'));
    }
    return null;
  }

  /**
   * Stage 2: release date and genres. Failures yield empty details.
   */
  async fetchReleaseDetails(releaseId: string): Promise<ReleaseDetails> {
    try {
      const body = await this.http.getJson(`${this.apiUrl}/release/${releaseId}`, {
        inc: 'genres+tags',
        fmt: 'json',
      });
      return parseReleaseDetails(body);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug(`MusicBrainz release ${releaseId} details failed: ${message}`, { step: 'musicbrainz' });
      return { title: null, date: null, genres: [] };
    }
  }

  private async search(entity: 'release' | 'recording', query: string, inc?: string): Promise<unknown> {
    try {
      const params: Record<string, string | number> = { query, fmt: 'json', limit: 1 };
      if (inc) params.inc = inc;
      return await this.http.getJson(`${this.apiUrl}/${entity}`, params);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug(`MusicBrainz ${entity} search failed: ${message}`, { step: 'musicbrainz', cause: query });
      return null;
    }
  }
}
