/**
 * Album Art Fetcher Service
 *
 * Downloads front-cover artwork. `downloadArtwork` is shared by every source:
 * it rejects responses that are not images or fall below the source's size
 * floor (placeholder and blank art are usually tiny). The Cover Art Archive
 * lookup walks the release's image listing before falling back to the
 * conventional `/front` path.
 *
 * All fetchers return null on any failure so album art is always best-effort.
 */

import type { HttpClient } from './httpClient';
import type { Logger } from './logger';
import type { ArtworkImage } from '../../shared/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Thumbnail variants offered for each listed image */
interface CAAThumbnails {
  large?: string;
  small?: string;
  [size: string]: string | undefined;
}

/** One entry of a Cover Art Archive release listing */
export interface CAAImage {
  front?: boolean;
  image?: string;
  thumbnails?: CAAThumbnails;
}

/** Options shared by the artwork fetchers */
export interface AlbumArtFetcherOptions {
  /** Minimum accepted image size in bytes */
  minBytes: number;
  /** Cover Art Archive base URL (for testing) */
  caaBaseUrl?: string;
  logger?: Logger | null;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const CAA_BASE_URL = 'https://coverartarchive.org';

/** Used when a server answers with a bare "image" or no subtype */
const FALLBACK_MIME = 'image/jpeg';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Extracts the usable entries of a Cover Art Archive listing body.
 * Returns [] for anything that is not `{ images: [...] }`.
 */
export function parseCAAListing(body: unknown): CAAImage[] {
  if (!isRecord(body) || !Array.isArray(body.images)) return [];

  const images: CAAImage[] = [];
  for (const entry of body.images) {
    if (!isRecord(entry)) continue;
    const thumbnails: CAAThumbnails = {};
    if (isRecord(entry.thumbnails)) {
      for (const [size, url] of Object.entries(entry.thumbnails)) {
        if (typeof url === 'string') thumbnails[size] = url;
      }
    }
    images.push({
      front: entry.front === true,
      image: typeof entry.image === 'string' ? entry.image : undefined,
      thumbnails,
    });
  }
  return images;
}

/**
 * Orders the download URLs to try for a listing: front images only (all
 * images when none is flagged), each as large thumbnail, small thumbnail,
 * then the full-size original.
 */
export function candidateImageUrls(images: CAAImage[]): string[] {
  const fronts = images.filter((img) => img.front);
  const pool = fronts.length > 0 ? fronts : images;

  const urls: string[] = [];
  for (const img of pool) {
    for (const url of [img.thumbnails?.large, img.thumbnails?.small, img.image]) {
      if (url) urls.push(url);
    }
  }
  return urls;
}

// ─── Fetchers ────────────────────────────────────────────────────────────────

/**
 * Downloads one artwork URL and returns it when it is an image of at least
 * `minBytes` bytes.
 *
 * @returns ArtworkImage, or null when the download failed or was rejected
 */
export async function downloadArtwork(
  http: HttpClient,
  url: string,
  minBytes: number,
  logger: Logger | null = null,
): Promise<ArtworkImage | null> {
  try {
    const { data, contentType } = await http.getBinary(url);
    if (!contentType.startsWith('image')) {
      logger?.debug(`Rejected artwork (content-type "${contentType}")`, { step: 'artwork', cause: url });
      return null;
    }
    if (data.length < minBytes) {
      logger?.debug(`Rejected artwork (${data.length} bytes < ${minBytes})`, { step: 'artwork', cause: url });
      return null;
    }
    return { data, mimeType: contentType.includes('/') ? contentType : FALLBACK_MIME };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.debug(`Artwork download failed: ${message}`, { step: 'artwork', cause: url });
    return null;
  }
}

/**
 * Fetches the front cover of a MusicBrainz release from the Cover Art Archive.
 *
 * Walks the release's JSON listing first; if the listing is unusable or none
 * of its images pass the size floor, requests the `/front` path.
 *
 * @returns ArtworkImage, or null when no acceptable image exists
 */
export async function fetchCoverArtArchiveImage(
  http: HttpClient,
  releaseId: string,
  options: AlbumArtFetcherOptions,
): Promise<ArtworkImage | null> {
  const baseUrl = options.caaBaseUrl ?? CAA_BASE_URL;
  const logger = options.logger ?? null;

  let urls: string[] = [];
  try {
    urls = candidateImageUrls(parseCAAListing(await http.getJson(`${baseUrl}/release/${releaseId}`)));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger?.debug(`Cover Art Archive listing unavailable: ${message}`, { step: 'artwork' });
  }

  for (const url of urls) {
    const image = await downloadArtwork(http, url, options.minBytes, logger);
    if (image) return image;
  }

  return downloadArtwork(http, `${baseUrl}/release/${releaseId}/front`, options.minBytes, logger);
}
