import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { FrameListStore } from '../../src/main/services/tagStore';
import type { Frame, TagStore } from '../../src/main/services/tagStore';
import type { CandidateSource } from '../../src/main/services/resolver';
import { DEFAULT_HTTP_SETTINGS, DEFAULT_IMAGE_FLOORS } from '../../src/shared/types';
import type { Candidate, ResolvedRecord, RunConfig, TrackMeta } from '../../src/shared/types';

// ─── Tag Stores ──────────────────────────────────────────────────────────────

/** In-memory tag store that counts persists */
export class MemoryTagStore extends FrameListStore {
  persistCount = 0;
  persistedVersions: Array<3 | 4> = [];
  failWith: Error | null = null;

  constructor(filePath: string, frames: Frame[] = []) {
    super(filePath, frames);
  }

  persist(version: 3 | 4): Promise<void> {
    if (this.failWith) return Promise.reject(this.failWith);
    this.persistCount++;
    this.persistedVersions.push(version);
    return Promise.resolve();
  }

  snapshot(): Frame[] {
    return [...this.frames];
  }
}

/** Opener over a fixed map of stores; unknown paths fail like an unreadable file */
export function memoryOpener(stores: Map<string, TagStore>): (filePath: string) => Promise<TagStore> {
  return (filePath) => {
    const store = stores.get(filePath);
    return store ? Promise.resolve(store) : Promise.reject(new Error(`cannot read ${filePath}`));
  };
}

// ─── Records & Config ────────────────────────────────────────────────────────

/** Image bytes of a given size, filled with a recognisable byte */
export function imageBytes(size: number, fill = 0xab): Buffer {
  return Buffer.alloc(size, fill);
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    image: { data: imageBytes(30_000), mimeType: 'image/jpeg' },
    source: 'iTunes 1200px',
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<ResolvedRecord> = {}): ResolvedRecord {
  return {
    image: { data: imageBytes(30_000), mimeType: 'image/jpeg' },
    source: 'iTunes 1200px',
    genres: [],
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    targetDir: '/music',
    recursive: false,
    extension: '.mp3',
    concurrency: 4,
    dryRun: false,
    force: false,
    update: { album: false, year: false, genre: false, artist: false, title: false, track: false },
    id3Version: 3,
    logDir: null,
    verbose: false,
    http: { ...DEFAULT_HTTP_SETTINGS },
    minImageBytes: { ...DEFAULT_IMAGE_FLOORS },
    ...overrides,
  };
}

// ─── Sources ─────────────────────────────────────────────────────────────────

/** Source yielding fixed candidates and recording every request */
export function fakeSource(name: string, candidates: Candidate[]): CandidateSource & { seen: TrackMeta[] } {
  const seen: TrackMeta[] = [];
  return {
    name,
    seen,
    async *candidates(meta: TrackMeta): AsyncGenerator<Candidate> {
      seen.push(meta);
      for (const candidate of candidates) {
        await Promise.resolve();
        yield candidate;
      }
    },
  };
}

/** Sleep stub that resolves immediately */
export function instantSleep(): Mock<(ms: number) => Promise<void>> {
  return vi.fn((_ms: number) => Promise.resolve());
}

// ─── Audio ───────────────────────────────────────────────────────────────────

/** MPEG-1 Layer III, 128 kbps, 44.1 kHz frame header; frames are 417 bytes */
const FRAME_HEADER = [0xff, 0xfb, 0x90, 0x64];
const FRAME_LENGTH = 417;

/**
 * A tag-less MP3 body made of silent frames. Enough for the tag readers and
 * writers; not meant to be played.
 */
export function silentMp3(frameCount = 8): Buffer {
  const frames: Buffer[] = [];
  for (let i = 0; i < frameCount; i++) {
    const frame = Buffer.alloc(FRAME_LENGTH);
    Buffer.from(FRAME_HEADER).copy(frame, 0);
    frames.push(frame);
  }
  return Buffer.concat(frames);
}
