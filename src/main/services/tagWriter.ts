/**
 * Tag Writer Service
 *
 * Applies a ResolvedRecord to a file's tag store under the field-level write
 * policy. Every descriptive field goes through the same four-input table;
 * the cover image replaces the whole APIC slot and is only kept when the
 * file already has art and force is off.
 *
 * Writing is idempotent: a field is only touched when its decision is write
 * or overwrite, and the store is persisted once, only if something changed.
 */

import { FRONT_COVER, getText, hasPicture, isPictureFrame } from './tagStore';
import type { TagStore, TextFrameId } from './tagStore';
import { FIELD_NAMES } from '../../shared/types';
import type { FieldName, FieldOutcome, ResolvedRecord, RunConfig, WriteDecision } from '../../shared/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Inputs of the field write policy */
export interface FieldPolicyInput {
  /** A value was discovered for the field */
  discovered: boolean;
  /** The file already carries a value for the field */
  existing: boolean;
  /** Per-field update flag */
  update: boolean;
  /** Global force flag */
  force: boolean;
}

/** What happens to the image slot */
export type ImageDecision = 'none' | 'keep' | 'write';

/** Pure plan of what applying a record would do */
export interface WritePlan {
  fields: FieldOutcome[];
  image: ImageDecision;
  /** Bytes of the image that would be embedded (0 unless image is 'write') */
  imageBytes: number;
}

/** Result of applying a record */
export interface WriteResult {
  success: boolean;
  filePath: string;
  plan: WritePlan;
  /** Whether the store was persisted (false when nothing changed) */
  persisted: boolean;
  error: string | null;
}

/** Config subset the writer depends on */
export type WriterConfig = Pick<RunConfig, 'force' | 'update' | 'id3Version'>;

// ─── Constants ────────────────────────────────────────────────────────────────

/** Frame holding each descriptive field */
export const FIELD_FRAMES: Record<FieldName, TextFrameId> = {
  album: 'TALB',
  year: 'TDRC',
  genre: 'TCON',
  artist: 'TPE1',
  title: 'TIT2',
  track: 'TRCK',
};

/**
 * Field write policy, keyed by `${existing}|${update}|${force}` for a
 * discovered value. Undiscovered values are never written.
 */
const FIELD_POLICY: Record<string, WriteDecision> = {
  'false|false|false': 'write',
  'false|false|true': 'write',
  'false|true|false': 'write',
  'false|true|true': 'write',
  'true|false|false': 'keep',
  'true|false|true': 'keep',
  'true|true|false': 'keep',
  'true|true|true': 'overwrite',
};

export const COVER_DESCRIPTION = 'Front cover';

// ─── Policy ───────────────────────────────────────────────────────────────────

/**
 * Decides what happens to one field.
 *
 * | discovered | existing | update | force | decision  |
 * |------------|----------|--------|-------|-----------|
 * | no         | any      | any    | any   | none      |
 * | yes        | no       | any    | any   | write     |
 * | yes        | yes      | off    | any   | keep      |
 * | yes        | yes      | on     | off   | keep      |
 * | yes        | yes      | on     | on    | overwrite |
 */
export function decideFieldWrite(input: FieldPolicyInput): WriteDecision {
  if (!input.discovered) return 'none';
  return FIELD_POLICY[`${input.existing}|${input.update}|${input.force}`];
}

/**
 * Decides what happens to the image slot. Update flags do not apply.
 * Existing art without force is kept whether or not an image was found.
 */
export function decideImageWrite(input: { discovered: boolean; existing: boolean; force: boolean }): ImageDecision {
  if (input.existing && !input.force) return 'keep';
  if (!input.discovered) return 'none';
  return 'write';
}

/**
 * Formats "n/count" (or "n") for TRCK. Returns null without a track number.
 */
export function formatTrack(trackNumber: number | undefined, trackCount: number | undefined): string | null {
  if (trackNumber === undefined || trackNumber <= 0) return null;
  return trackCount !== undefined && trackCount > 0 ? `${trackNumber}/${trackCount}` : String(trackNumber);
}

/**
 * The value a record carries for each field, or null.
 */
export function discoveredValues(record: ResolvedRecord): Record<FieldName, string | null> {
  return {
    album: record.albumTitle ?? null,
    year: record.releaseDate ?? null,
    genre: record.genres[0] ?? null,
    artist: record.artistName ?? null,
    title: record.trackTitle ?? null,
    track: formatTrack(record.trackNumber, record.trackCount),
  };
}

// ─── Planning ─────────────────────────────────────────────────────────────────

/**
 * Computes every decision without touching the store. Used directly for
 * dry-run and as the first step of applyRecord.
 */
export function planRecordWrite(store: TagStore, record: ResolvedRecord, config: WriterConfig): WritePlan {
  const values = discoveredValues(record);

  const fields = FIELD_NAMES.map((field): FieldOutcome => {
    const value = values[field];
    const decision = decideFieldWrite({
      discovered: value !== null && value.trim().length > 0,
      existing: getText(store, FIELD_FRAMES[field]) !== null,
      update: config.update[field],
      force: config.force,
    });
    return {
      field,
      value,
      decision,
      attempted: decision === 'write' || decision === 'overwrite',
      written: false,
    };
  });

  const image = decideImageWrite({
    discovered: record.image !== null && record.image.data.length > 0,
    existing: hasPicture(store),
    force: config.force,
  });

  return {
    fields,
    image,
    imageBytes: image === 'write' && record.image ? record.image.data.length : 0,
  };
}

// ─── Writing ──────────────────────────────────────────────────────────────────

/**
 * Applies `record` to `store` and persists once at `config.id3Version`.
 * Never throws: failures are reported with `success: false`.
 */
export async function applyRecord(store: TagStore, record: ResolvedRecord, config: WriterConfig): Promise<WriteResult> {
  let plan: WritePlan = { fields: [], image: 'none', imageBytes: 0 };

  try {
    plan = planRecordWrite(store, record, config);
    let changed = false;

    for (const outcome of plan.fields) {
      if (!outcome.attempted || outcome.value === null) continue;
      const frameId = FIELD_FRAMES[outcome.field];
      if (outcome.decision === 'overwrite' && sameText(store, frameId, outcome.value)) continue;
      store.deleteAll(frameId);
      store.add({ id: frameId, text: outcome.value });
      changed = true;
    }

    if (plan.image === 'write' && record.image && !sameImage(store, record.image.data)) {
      store.deleteAll('APIC');
      store.add({
        id: 'APIC',
        mimeType: record.image.mimeType || 'image/jpeg',
        pictureType: FRONT_COVER,
        description: COVER_DESCRIPTION,
        data: record.image.data,
      });
      changed = true;
    }

    if (changed) {
      await store.persist(config.id3Version);
    }

    return {
      success: true,
      filePath: store.filePath,
      plan: {
        ...plan,
        fields: plan.fields.map((outcome) => ({ ...outcome, written: outcome.attempted })),
      },
      persisted: changed,
      error: null,
    };
  } catch (error: unknown) {
    return {
      success: false,
      filePath: store.filePath,
      plan,
      persisted: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function sameText(store: TagStore, frameId: TextFrameId, value: string): boolean {
  const frames = store.getAll(frameId);
  return frames.length === 1 && !isPictureFrame(frames[0]) && frames[0].text === value;
}

function sameImage(store: TagStore, data: Buffer): boolean {
  const frames = store.getAll('APIC');
  return frames.length === 1 && isPictureFrame(frames[0]) && frames[0].data.equals(data);
}
