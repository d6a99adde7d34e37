/**
 * Shared type definitions for tagfill.
 * These interfaces are used by the services, the orchestrator and the CLI.
 */

/** Default file extension scanned when none is configured */
export const DEFAULT_EXTENSION = '.mp3';

/** Identifying fields read from a file's tags or name. Frozen after construction. */
export interface TrackMeta {
  readonly artist: string | null;
  readonly album: string | null;
  readonly title: string | null;
}

/** Image bytes downloaded from an artwork source */
export interface ArtworkImage {
  /** Raw image bytes */
  data: Buffer;
  /** MIME type reported by the server, e.g. "image/jpeg" */
  mimeType: string;
}

/** A not-yet-accepted metadata/artwork result from a source client */
export interface Candidate {
  /** Cover image, or null when the source resolved details but no artwork */
  image: ArtworkImage | null;
  /** Human-readable source label, e.g. "iTunes 1200px" */
  source: string;
  albumTitle?: string;
  /** Release date, YYYY or YYYY-MM-DD */
  releaseDate?: string;
  /** Single genre (iTunes) */
  genre?: string;
  /** Ranked genre list (MusicBrainz) */
  genres?: string[];
  artistName?: string;
  trackTitle?: string;
  trackNumber?: number;
  trackCount?: number;
}

/** The single accepted candidate for a file */
export interface ResolvedRecord extends Candidate {
  /** Normalized genre list; the first entry is the primary genre */
  genres: string[];
}

/** Descriptive fields governed by the write policy */
export type FieldName = 'album' | 'year' | 'genre' | 'artist' | 'title' | 'track';

/** All field names in report order */
export const FIELD_NAMES: readonly FieldName[] = [
  'album',
  'year',
  'genre',
  'artist',
  'title',
  'track',
] as const;

/** Outcome of the write policy for one field */
export type WriteDecision = 'none' | 'write' | 'keep' | 'overwrite';

/** Per-field result of applying a ResolvedRecord */
export interface FieldOutcome {
  field: FieldName;
  /** Discovered value, or null when the record carried none */
  value: string | null;
  decision: WriteDecision;
  /** The decision called for a write (write or overwrite) */
  attempted: boolean;
  /** The write was persisted to the file */
  written: boolean;
}

/** Terminal status of one file */
export type WorkStatus = 'ok' | 'skip' | 'miss' | 'error' | 'found';

/** Result of processing a single file */
export interface WorkResult {
  filePath: string;
  status: WorkStatus;
  /** Source label of the accepted record */
  source: string | null;
  detail: string | null;
  /** Image bytes embedded (or that would be embedded in dry-run) */
  imageBytes: number;
  fields: FieldOutcome[];
}

/** Per-status counts for the final summary */
export type StatusTally = Record<WorkStatus, number>;

/** Retry/backoff settings for the HTTP fetch layer */
export interface HttpSettings {
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Total attempts per request (first try included) */
  maxAttempts: number;
  /** Backoff base delay in milliseconds */
  baseDelayMs: number;
  /** Exponential growth factor per attempt */
  backoffFactor: number;
  /** Maximum random jitter added to each delay */
  jitterMs: number;
  /** Upper bound for any single delay, including Retry-After */
  maxDelayMs: number;
}

/** Minimum accepted artwork size per source, in bytes */
export interface ImageFloors {
  itunes: number;
  coverArtArchive: number;
}

/** One immutable configuration value per run */
export interface RunConfig {
  readonly targetDir: string;
  readonly recursive: boolean;
  /** Lower-case extension including the dot */
  readonly extension: string;
  readonly concurrency: number;
  readonly dryRun: boolean;
  readonly force: boolean;
  readonly update: Readonly<Record<FieldName, boolean>>;
  readonly id3Version: 3 | 4;
  /** Log directory, or null to disable file logging */
  readonly logDir: string | null;
  readonly verbose: boolean;
  readonly http: Readonly<HttpSettings>;
  readonly minImageBytes: Readonly<ImageFloors>;
}

/** Persisted defaults loaded from the settings file */
export interface AppSettings {
  /** Number of concurrent file jobs */
  concurrency: number;
  /** ID3v2 minor version used when saving */
  id3Version: 3 | 4;
  /** Extension scanned for */
  extension: string;
  /** Per-field update flags */
  update: Record<FieldName, boolean>;
  /** Log directory (null = platform default) */
  logDir: string | null;
  /** Whether to write a daily log file */
  writeLogFile: boolean;
  http: HttpSettings;
  minImageBytes: ImageFloors;
}

export const DEFAULT_HTTP_SETTINGS: HttpSettings = {
  timeoutMs: 12_000,
  maxAttempts: 3,
  baseDelayMs: 500,
  backoffFactor: 1.7,
  jitterMs: 300,
  maxDelayMs: 5_000,
};

export const DEFAULT_IMAGE_FLOORS: ImageFloors = {
  itunes: 25_000,
  coverArtArchive: 20_000,
};

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  concurrency: 4,
  id3Version: 3,
  extension: DEFAULT_EXTENSION,
  update: {
    album: false,
    year: false,
    genre: false,
    artist: false,
    title: false,
    track: false,
  },
  logDir: null,
  writeLogFile: true,
  http: { ...DEFAULT_HTTP_SETTINGS },
  minImageBytes: { ...DEFAULT_IMAGE_FLOORS },
};
