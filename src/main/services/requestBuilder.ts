/**
 * Request Builder
 *
 * Derives the identifying fields (artist, album, title) used to query the
 * lookup services. Embedded tags win; when a file carries none of the three,
 * the file name is parsed as "Artist - Title". Never touches the network
 * and never throws.
 */

import * as path from 'path';
import { getText } from './tagStore';
import type { TagStore } from './tagStore';
import type { TrackMeta } from '../../shared/types';

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Matches strings that look like a domain/download-site name (e.g. "spotifydown.com") */
const DOMAIN_PATTERN = /^[\w.-]+\.(com|net|org|io|co|cc|fm|me|to)$/i;

/** "<site.tld> - rest" prefix left by download sites */
const DOMAIN_PREFIX = /^[\w.-]+\.(com|net|org|io|co|cc|fm|me|to)\s*[-–—]\s*/i;

/** First spaced hyphen or dash separating artist from title */
const ARTIST_TITLE_SEPARATOR = /^(.+?)\s+[-–—]\s+(.+)$/;

/**
 * Returns the file's base name with download-site domain prefixes removed.
 *
 * Examples:
 *   "spotifydown.com - Feel My Love.mp3"  →  "Feel My Love"
 *   "Artist - Title.mp3"                  →  "Artist - Title"  (unchanged; no domain)
 */
export function titleFromFilename(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  const cleaned = base.replace(DOMAIN_PREFIX, '').trim();
  return cleaned || base;
}

/**
 * Splits "Artist - Title" on the first spaced separator.
 * Returns null when the name has no separator or the artist part looks like a domain.
 */
export function splitArtistTitle(stem: string): { artist: string; title: string } | null {
  const match = ARTIST_TITLE_SEPARATOR.exec(stem);
  if (!match) return null;

  const artist = match[1].trim();
  const title = match[2].trim();
  if (!artist || !title || DOMAIN_PATTERN.test(artist)) return null;
  return { artist, title };
}

// ─── Builder ──────────────────────────────────────────────────────────────────

/**
 * Builds the TrackMeta for one file.
 *
 * @param filePath - Path of the file (its name is the fallback source)
 * @param store - The file's tag store, or null when it could not be opened
 */
export function buildTrackMeta(filePath: string, store: TagStore | null): TrackMeta {
  const artist = store ? (getText(store, 'TPE1') ?? getText(store, 'TPE2')) : null;
  const album = store ? getText(store, 'TALB') : null;
  const title = store ? getText(store, 'TIT2') : null;
  const stem = titleFromFilename(filePath);

  if (artist === null && album === null && title === null) {
    const parsed = splitArtistTitle(stem);
    return Object.freeze({
      artist: parsed?.artist ?? null,
      album: null,
      title: parsed?.title ?? stem,
    });
  }

  return Object.freeze({ artist, album, title: title ?? stem });
}
