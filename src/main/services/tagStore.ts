/**
 * Tag Store Service
 *
 * A small frame-level view of a file's embedded ID3v2 tag. Frames are read
 * with music-metadata (which understands ID3v2.2, 2.3 and 2.4) and saved with
 * node-id3, which always produces ID3v2.3. Saving as ID3v2.4 rewrites that
 * output in place: version byte, synchsafe frame sizes and a TDRC frame in
 * place of TYER/TDAT.
 */

import * as fs from 'fs';
import * as mm from 'music-metadata';
import NodeID3 from 'node-id3';
import { FileReadError, WriteError } from './errors';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Text frames modeled by the store */
export type TextFrameId = 'TALB' | 'TDRC' | 'TCON' | 'TPE1' | 'TPE2' | 'TIT2' | 'TRCK';

/** Every frame key the store understands */
export type FrameId = TextFrameId | 'APIC';

export interface TextFrame {
  id: TextFrameId;
  text: string;
}

export interface PictureFrame {
  id: 'APIC';
  mimeType: string;
  /** ID3 picture type; 3 is the front cover */
  pictureType: number;
  description: string;
  data: Buffer;
}

export type Frame = TextFrame | PictureFrame;

/** Frame-store contract used by the request builder and tag writer */
export interface TagStore {
  readonly filePath: string;
  getAll(key: FrameId): Frame[];
  deleteAll(key: FrameId): void;
  add(frame: Frame): void;
  /** Saves every frame to the file as ID3v2.`version` */
  persist(version: 3 | 4): Promise<void>;
}

/** Opens the tag store of one file */
export type TagStoreOpener = (filePath: string) => Promise<TagStore>;

// ─── Constants ────────────────────────────────────────────────────────────────

/** ID3 picture type for the front cover */
export const FRONT_COVER = 3;

/** Frame ids used by ID3v2.2, mapped to their v2.3/2.4 equivalents */
const V22_FRAME_IDS: Record<string, FrameId> = {
  TAL: 'TALB',
  TYE: 'TDRC',
  TCO: 'TCON',
  TP1: 'TPE1',
  TP2: 'TPE2',
  TT2: 'TIT2',
  TRK: 'TRCK',
  PIC: 'APIC',
};

/** Picture type names as music-metadata reports them, indexed by ID3 type number */
const PICTURE_TYPE_NAMES: readonly string[] = [
  'Other',
  "32x32 pixels 'file icon' (PNG only)",
  'Other file icon',
  'Cover (front)',
  'Cover (back)',
  'Leaflet page',
  'Media (e.g. label side of CD)',
  'Lead artist/lead performer/soloist',
  'Artist/performer',
  'Conductor',
  'Band/Orchestra',
  'Composer',
  'Lyricist/text writer',
  'Recording Location',
  'During recording',
  'During performance',
  'Movie/video screen capture',
  'A bright coloured fish',
  'Illustration',
  'Band/artist logotype',
  'Publisher/Studio logotype',
];

/** node-id3 aliases rewritten from the store on every save. Pictures are appended separately. */
const MODELED_ALIASES = [
  'album',
  'year',
  'date',
  'genre',
  'artist',
  'performerInfo',
  'title',
  'trackNumber',
  'image',
] as const;

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function isPictureFrame(frame: Frame): frame is PictureFrame {
  return frame.id === 'APIC';
}

/** First text value stored under `key`, trimmed; null when missing or blank */
export function getText(store: TagStore, key: TextFrameId): string | null {
  for (const frame of store.getAll(key)) {
    if (!isPictureFrame(frame) && frame.text.trim().length > 0) {
      return frame.text.trim();
    }
  }
  return null;
}

/** Whether the store carries at least one embedded picture */
export function hasPicture(store: TagStore): boolean {
  return store.getAll('APIC').length > 0;
}

function toFrameId(id: string): FrameId | null {
  if (id in V22_FRAME_IDS) return V22_FRAME_IDS[id];
  switch (id) {
    case 'TYER':
      return 'TDRC';
    case 'TALB':
    case 'TDRC':
    case 'TCON':
    case 'TPE1':
    case 'TPE2':
    case 'TIT2':
    case 'TRCK':
    case 'APIC':
      return id;
    default:
      return null;
  }
}

function pictureTypeNumber(type: unknown): number {
  if (typeof type === 'number') return type;
  const index = typeof type === 'string' ? PICTURE_TYPE_NAMES.indexOf(type) : -1;
  return index >= 0 ? index : 0;
}

/**
 * Converts the native ID3v2 tags reported by music-metadata into store frames.
 * TYER with an optional TDAT (DDMM) is folded into a single TDRC date.
 */
export function framesFromNative(tags: ReadonlyArray<{ id: string; value: unknown }>): Frame[] {
  const frames: Frame[] = [];
  let tdat: string | null = null;
  let yearIndex = -1;

  for (const tag of tags) {
    if (tag.id === 'TDAT' && typeof tag.value === 'string') {
      tdat = tag.value;
      continue;
    }

    const id = toFrameId(tag.id);
    if (id === null) continue;

    if (id === 'APIC') {
      const picture = tag.value;
      if (
        picture !== null &&
        typeof picture === 'object' &&
        'data' in picture &&
        picture.data instanceof Uint8Array
      ) {
        frames.push({
          id: 'APIC',
          mimeType: 'format' in picture && typeof picture.format === 'string' ? picture.format : 'image/jpeg',
          pictureType: pictureTypeNumber('type' in picture ? picture.type : undefined),
          description:
            'description' in picture && typeof picture.description === 'string' ? picture.description : '',
          data: Buffer.from(picture.data),
        });
      }
      continue;
    }

    const text = typeof tag.value === 'number' ? String(tag.value) : tag.value;
    if (typeof text !== 'string') continue;
    if (tag.id === 'TYER' || tag.id === 'TYE') {
      yearIndex = frames.length;
    }
    frames.push({ id, text });
  }

  const yearFrame = yearIndex >= 0 ? frames[yearIndex] : undefined;
  if (yearFrame && !isPictureFrame(yearFrame) && tdat && /^\d{4}$/.test(tdat) && /^\d{4}$/.test(yearFrame.text)) {
    const day = tdat.slice(0, 2);
    const month = tdat.slice(2, 4);
    frames[yearIndex] = { id: 'TDRC', text: `${yearFrame.text}-${month}-${day}` };
  }

  return frames;
}

/**
 * If `filePath` is read-only, temporarily makes it writable and returns a
 * restore function. If it is already writable, the restore function is a no-op.
 */
function makeWritableTemporarily(filePath: string): () => void {
  const stat = fs.statSync(filePath);
  if (stat.mode & 0o200) {
    return (): void => undefined;
  }

  const originalMode = stat.mode & 0o777;
  fs.chmodSync(filePath, originalMode | 0o200);
  return (): void => {
    fs.chmodSync(filePath, originalMode);
  };
}

// ─── ID3v2.4 Conversion ───────────────────────────────────────────────────────

function readSynchsafe(buffer: Buffer, offset: number): number {
  return (
    ((buffer[offset] & 0x7f) << 21) |
    ((buffer[offset + 1] & 0x7f) << 14) |
    ((buffer[offset + 2] & 0x7f) << 7) |
    (buffer[offset + 3] & 0x7f)
  );
}

function writeSynchsafe(value: number): Buffer {
  return Buffer.from([(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f]);
}

function buildFrame(id: string, body: Buffer): Buffer {
  return Buffer.concat([Buffer.from(id, 'latin1'), writeSynchsafe(body.length), Buffer.alloc(2), body]);
}

interface RawFrame {
  id: string;
  body: Buffer;
  /** Header and body as found in the tag */
  raw: Buffer;
}

function isId3v23(file: Buffer): boolean {
  return file.length >= 10 && file.toString('latin1', 0, 3) === 'ID3' && file[3] === 3;
}

/** Frames of an ID3v2.3 tag, stopping at padding */
function readV23Frames(file: Buffer, tagEnd: number): RawFrame[] {
  const frames: RawFrame[] = [];
  let offset = 10;

  while (offset + 10 <= tagEnd) {
    const id = file.toString('latin1', offset, offset + 4);
    if (!/^[A-Z0-9]{4}$/.test(id)) break;
    const end = offset + 10 + file.readUInt32BE(offset + 4);
    frames.push({ id, body: file.subarray(offset + 10, end), raw: file.subarray(offset, end) });
    offset = end;
  }

  return frames;
}

function isLatin1(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0xff) return false;
  }
  return true;
}

/** Encodes one picture as an ID3v2.3 APIC frame */
export function encodePictureFrame(picture: PictureFrame): Buffer {
  const latin1 = isLatin1(picture.description);
  const description = latin1
    ? Buffer.concat([Buffer.from(picture.description, 'latin1'), Buffer.alloc(1)])
    : Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(picture.description, 'utf16le'), Buffer.alloc(2)]);
  const body = Buffer.concat([
    Buffer.from([latin1 ? 0x00 : 0x01]),
    Buffer.from(picture.mimeType || 'image/jpeg', 'latin1'),
    Buffer.alloc(1),
    Buffer.from([picture.pictureType & 0xff]),
    description,
    picture.data,
  ]);
  const header = Buffer.alloc(10);
  header.write('APIC', 0, 'latin1');
  header.writeUInt32BE(body.length, 4);
  return Buffer.concat([header, body]);
}

/**
 * Appends ID3v2.3 frames to the tag at the start of `file`, creating the tag
 * when there is none. Padding is dropped.
 *
 * @throws WriteError when `file` starts with a tag of another version
 */
export function appendId3v23Frames(file: Buffer, frames: Buffer[]): Buffer {
  const hasTag = file.length >= 10 && file.toString('latin1', 0, 3) === 'ID3';
  if (hasTag && !isId3v23(file)) {
    throw new WriteError('expected an ID3v2.3 tag to extend');
  }

  const tagEnd = hasTag ? 10 + readSynchsafe(file, 6) : 0;
  const existing = hasTag ? readV23Frames(file, tagEnd).map((frame) => frame.raw) : [];
  const body = Buffer.concat([...existing, ...frames]);
  const header = Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([3, 0, 0]), writeSynchsafe(body.length)]);
  return Buffer.concat([header, body, file.subarray(tagEnd)]);
}

/**
 * Rewrites an ID3v2.3 tag at the start of `file` as ID3v2.4.
 * TYER/TDAT/TIME are dropped and `date` (if any) becomes a UTF-8 TDRC frame.
 *
 * @throws WriteError when `file` does not start with an ID3v2.3 tag
 */
export function convertToId3v24(file: Buffer, date: string | null): Buffer {
  if (!isId3v23(file)) {
    throw new WriteError('expected an ID3v2.3 tag to convert');
  }

  const tagEnd = 10 + readSynchsafe(file, 6);
  const frames = readV23Frames(file, tagEnd)
    .filter((frame) => !['TYER', 'TDAT', 'TIME', 'TDRC'].includes(frame.id))
    .map((frame) => buildFrame(frame.id, frame.body));

  if (date) {
    frames.push(buildFrame('TDRC', Buffer.concat([Buffer.from([0x03]), Buffer.from(date, 'utf8')])));
  }

  const body = Buffer.concat(frames);
  const header = Buffer.concat([Buffer.from('ID3', 'latin1'), Buffer.from([4, 0, 0]), writeSynchsafe(body.length)]);
  return Buffer.concat([header, body, file.subarray(tagEnd)]);
}

// ─── Stores ───────────────────────────────────────────────────────────────────

/**
 * In-memory frame list implementing the query/mutation half of TagStore.
 * Subclasses decide how frames are persisted.
 */
export abstract class FrameListStore implements TagStore {
  protected frames: Frame[];

  constructor(
    readonly filePath: string,
    frames: Frame[] = [],
  ) {
    this.frames = [...frames];
  }

  getAll(key: FrameId): Frame[] {
    return this.frames.filter((frame) => frame.id === key);
  }

  deleteAll(key: FrameId): void {
    this.frames = this.frames.filter((frame) => frame.id !== key);
  }

  add(frame: Frame): void {
    this.frames.push(frame);
  }

  abstract persist(version: 3 | 4): Promise<void>;
}

/**
 * Tag store backed by the ID3v2 tag of an MP3 file.
 *
 * Usage:
 * ```typescript
 * const store = await Id3TagStore.open('/music/song.mp3');
 * store.deleteAll('TALB');
 * store.add({ id: 'TALB', text: 'Album X' });
 * await store.persist(3);
 * ```
 */
export class Id3TagStore extends FrameListStore {
  /**
   * Reads the file's ID3v2 frames.
   *
   * @throws FileReadError if the file cannot be read or parsed
   */
  static async open(filePath: string): Promise<Id3TagStore> {
    let metadata: mm.IAudioMetadata;
    try {
      const buffer = await fs.promises.readFile(filePath);
      metadata = await mm.parseBuffer(buffer, 'audio/mpeg', {
        skipCovers: false,
        skipPostHeaders: true,
        duration: false,
      });
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new FileReadError(`Failed to read tags: ${cause.message}`, { filePath, cause });
    }

    const native = metadata.native['ID3v2.4'] ?? metadata.native['ID3v2.3'] ?? metadata.native['ID3v2.2'] ?? [];
    return new Id3TagStore(filePath, framesFromNative(native));
  }

  /**
   * Re-reads the file, merges the modeled frames over every frame node-id3
   * understands and writes the result back.
   *
   * @throws WriteError if the tag cannot be serialized or the file written
   */
  async persist(version: 3 | 4): Promise<void> {
    try {
      const original = await fs.promises.readFile(this.filePath);
      const tags: NodeID3.Tags = { ...NodeID3.read(original, { noRaw: true }) };
      for (const alias of MODELED_ALIASES) {
        delete tags[alias];
      }

      const date = this.text('TDRC');
      this.applyTo(tags, date, version);

      // node-id3 keeps a single picture, so every stored APIC frame is encoded here
      const pictures = this.getAll('APIC').flatMap((frame) => (isPictureFrame(frame) ? [encodePictureFrame(frame)] : []));
      let output = appendId3v23Frames(NodeID3.write(tags, original), pictures);
      if (version === 4) {
        output = convertToId3v24(output, date);
      }

      const restorePermissions = makeWritableTemporarily(this.filePath);
      try {
        await fs.promises.writeFile(this.filePath, output);
      } finally {
        restorePermissions();
      }
    } catch (error: unknown) {
      if (error instanceof WriteError) {
        throw new WriteError(error.message, { filePath: this.filePath, cause: error });
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new WriteError(`Failed to save tags: ${cause.message}`, { filePath: this.filePath, cause });
    }
  }

  private text(key: TextFrameId): string | null {
    const values = this.getAll(key).flatMap((frame) => (isPictureFrame(frame) ? [] : [frame.text]));
    return values.length > 0 ? values.join('/') : null;
  }

  private applyTo(tags: NodeID3.Tags, date: string | null, version: 3 | 4): void {
    const album = this.text('TALB');
    const artist = this.text('TPE1');
    const albumArtist = this.text('TPE2');
    const title = this.text('TIT2');
    const genre = this.text('TCON');
    const track = this.text('TRCK');

    if (album !== null) tags.album = album;
    if (artist !== null) tags.artist = artist;
    if (albumArtist !== null) tags.performerInfo = albumArtist;
    if (title !== null) tags.title = title;
    if (genre !== null) tags.genre = genre;
    if (track !== null) tags.trackNumber = track;

    if (date !== null) {
      tags.year = date.slice(0, 4);
      // v2.4 keeps the full date in TDRC (see convertToId3v24)
      const match = /^\d{4}-(\d{2})-(\d{2})/.exec(date);
      if (match && version === 3) {
        tags.date = `${match[2]}${match[1]}`;
      }
    }

  }
}

/** Default opener used by the orchestrator */
export const openId3TagStore: TagStoreOpener = (filePath) => Id3TagStore.open(filePath);
