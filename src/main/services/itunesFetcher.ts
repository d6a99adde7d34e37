/**
 * iTunes Search Source
 *
 * The first-ranked lookup. Up to four free-text queries are issued in a fixed
 * order, and every result's 100px artwork URL is upscaled to the largest
 * tier the CDN actually serves. Candidates are produced lazily, so the
 * resolver stops downloading as soon as it accepts one.
 *
 * The iTunes Search API is free, requires no authentication, and has broad
 * coverage of mainstream music.
 */

import { downloadArtwork } from './albumArtFetcher';
import type { HttpClient } from './httpClient';
import type { Logger } from './logger';
import type { CandidateSource } from './resolver';
import type { Candidate, TrackMeta } from '../../shared/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** One query issued against the search endpoint */
export interface ItunesQuery {
  term: string;
  entity: 'album' | 'song';
}

/** Fields of a search result used by this source */
export interface ItunesTrack {
  artworkUrl100: string;
  collectionName?: string;
  releaseDate?: string;
  primaryGenreName?: string;
  artistName?: string;
  trackName?: string;
  trackNumber?: number;
  trackCount?: number;
}

/** Options for the iTunes source */
export interface ItunesSourceOptions {
  /** Minimum accepted artwork size in bytes */
  minImageBytes: number;
  /** Search endpoint (for testing) */
  searchUrl?: string;
  logger?: Logger | null;
}

// ─── Constants ────────────────────────────────────────────────────────────────

export const ITUNES_SEARCH_URL = 'https://itunes.apple.com/search';

/** Artwork sizes tried for each result, largest first */
export const ARTWORK_SIZES: readonly number[] = [1200, 1000, 800, 600];

const RESULTS_PER_QUERY = 5;

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Query variants in priority order. A variant is skipped when a field it
 * needs is missing.
 */
export function buildItunesQueries(meta: TrackMeta): ItunesQuery[] {
  const queries: ItunesQuery[] = [];
  if (meta.artist && meta.album) queries.push({ term: `${meta.artist} ${meta.album}`, entity: 'album' });
  if (meta.artist && meta.title) queries.push({ term: `${meta.artist} ${meta.title}`, entity: 'song' });
  if (meta.album) queries.push({ term: meta.album, entity: 'album' });
  if (meta.title) queries.push({ term: meta.title, entity: 'song' });
  return queries;
}

/**
 * Rewrites the `/NNNxNNNbb.` segment of an iTunes artwork URL to `size`.
 * URLs without the segment are returned unchanged.
 *
 * e.g. ".../100x100bb.jpg" → ".../1200x1200bb.jpg"
 */
export function upscaleArtworkUrl(url: string, size: number): string {
  return url.replace(/\/\d+x\d+bb\./, `/${size}x${size}bb.`);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Extracts the results carrying artwork from a search response body.
 * Malformed bodies yield [].
 */
export function parseItunesResults(body: unknown): ItunesTrack[] {
  if (body === null || typeof body !== 'object' || !('results' in body) || !Array.isArray(body.results)) {
    return [];
  }

  const tracks: ItunesTrack[] = [];
  for (const raw of body.results) {
    if (raw === null || typeof raw !== 'object') continue;
    const artworkUrl100 = 'artworkUrl100' in raw ? optionalString(raw.artworkUrl100) : undefined;
    if (!artworkUrl100) continue;

    tracks.push({
      artworkUrl100,
      collectionName: 'collectionName' in raw ? optionalString(raw.collectionName) : undefined,
      releaseDate: 'releaseDate' in raw ? optionalString(raw.releaseDate) : undefined,
      primaryGenreName: 'primaryGenreName' in raw ? optionalString(raw.primaryGenreName) : undefined,
      artistName: 'artistName' in raw ? optionalString(raw.artistName) : undefined,
      trackName: 'trackName' in raw ? optionalString(raw.trackName) : undefined,
      trackNumber: 'trackNumber' in raw ? optionalNumber(raw.trackNumber) : undefined,
      trackCount: 'trackCount' in raw ? optionalNumber(raw.trackCount) : undefined,
    });
  }
  return tracks;
}

// ─── Source ───────────────────────────────────────────────────────────────────

/**
 * Lookup source backed by the iTunes Search API.
 *
 * Usage:
 * ```typescript
 * const itunes = new ItunesSource(http, { minImageBytes: 25_000 });
 * for await (const candidate of itunes.candidates(meta)) { ... }
 * ```
 */
export class ItunesSource implements CandidateSource {
  readonly name = 'iTunes';
  private readonly searchUrl: string;
  private readonly minImageBytes: number;
  private readonly logger: Logger | null;

  constructor(
    private readonly http: HttpClient,
    options: ItunesSourceOptions,
  ) {
    this.searchUrl = options.searchUrl ?? ITUNES_SEARCH_URL;
    this.minImageBytes = options.minImageBytes;
    this.logger = options.logger ?? null;
  }

  /**
   * Yields one candidate per search result whose artwork passes the size
   * floor, in query order then result order. Never throws.
   */
  async *candidates(meta: TrackMeta): AsyncGenerator<Candidate> {
    for (const query of buildItunesQueries(meta)) {
      const results = await this.runQuery(query);
      for (const track of results) {
        const candidate = await this.toCandidate(track, meta);
        if (candidate) yield candidate;
      }
    }
  }

  private async runQuery(query: ItunesQuery): Promise<ItunesTrack[]> {
    try {
      const body = await this.http.getJson(this.searchUrl, {
        term: query.term,
        media: 'music',
        entity: query.entity,
        limit: RESULTS_PER_QUERY,
      });
      const results = parseItunesResults(body);
      this.logger?.debug(`iTunes ${query.entity} "${query.term}": ${results.length} result(s)`, {
        step: 'itunes',
      });
      return results;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug(`iTunes ${query.entity} "${query.term}" failed: ${message}`, { step: 'itunes' });
      return [];
    }
  }

  private async toCandidate(track: ItunesTrack, meta: TrackMeta): Promise<Candidate | null> {
    const tried = new Set<string>();
    for (const size of ARTWORK_SIZES) {
      const url = upscaleArtworkUrl(track.artworkUrl100, size);
      if (tried.has(url)) continue;
      tried.add(url);

      const image = await downloadArtwork(this.http, url, this.minImageBytes, this.logger);
      if (!image) continue;

      return {
        image,
        source: `iTunes ${size}px`,
        albumTitle: track.collectionName,
        releaseDate: track.releaseDate?.slice(0, 10),
        genre: track.primaryGenreName,
        artistName: track.artistName,
        trackTitle: track.trackName ?? meta.title ?? undefined,
        trackNumber: track.trackNumber,
        trackCount: track.trackCount,
      };
    }
    return null;
  }
}
