import { describe, it, expect } from 'vitest';
import { Resolver, searchSource, toResolvedRecord } from '../../../src/main/services/resolver';
import type { CandidateSource } from '../../../src/main/services/resolver';
import type { Candidate, TrackMeta } from '../../../src/shared/types';
import { fakeSource, makeCandidate } from '../../helpers/fakes';

const META: TrackMeta = { artist: 'Artist', album: null, title: 'Song' };

describe('resolver', () => {
  describe('toResolvedRecord', () => {
    it('should prefer the genre list', () => {
      expect(toResolvedRecord(makeCandidate({ genre: 'Pop', genres: ['Rock', 'Indie'] })).genres).toEqual([
        'Rock',
        'Indie',
      ]);
    });

    it('should fall back to the single genre, then to an empty list', () => {
      expect(toResolvedRecord(makeCandidate({ genre: 'Pop' })).genres).toEqual(['Pop']);
      expect(toResolvedRecord(makeCandidate({ genres: [] })).genres).toEqual([]);
    });
  });

  describe('Resolver', () => {
    it('should accept the first candidate of the first source and never consult the second', async () => {
      const first = fakeSource('A', [
        makeCandidate({ source: 'A-1', albumTitle: 'Album X' }),
        makeCandidate({ source: 'A-2' }),
      ]);
      const second = fakeSource('B', [makeCandidate({ source: 'B-1' })]);

      const record = await new Resolver([first, second]).resolve(META);

      expect(record?.source).toBe('A-1');
      expect(record?.albumTitle).toBe('Album X');
      expect(first.seen).toEqual([META]);
      expect(second.seen).toEqual([]);
    });

    it('should fall through to the next source when one yields nothing', async () => {
      const first = fakeSource('A', []);
      const second = fakeSource('B', [makeCandidate({ source: 'B-1', image: null, releaseDate: '2020' })]);

      const record = await new Resolver([first, second]).resolve(META);

      expect(record).toMatchObject({ source: 'B-1', image: null, releaseDate: '2020', genres: [] });
      expect(second.seen).toEqual([META]);
    });

    it('should return null when every source is empty', async () => {
      await expect(new Resolver([fakeSource('A', []), fakeSource('B', [])]).resolve(META)).resolves.toBeNull();
    });

    it('should stop pulling from a source once a candidate is accepted', async () => {
      let produced = 0;
      const lazy: CandidateSource = {
        name: 'lazy',
        async *candidates(): AsyncGenerator<Candidate> {
          for (let i = 0; i < 3; i++) {
            await Promise.resolve();
            produced++;
            yield makeCandidate({ source: `lazy-${i}` });
          }
        },
      };

      const record = await new Resolver([lazy]).resolve(META);

      expect(record?.source).toBe('lazy-0');
      expect(produced).toBe(1);
    });
  });

  describe('searchSource', () => {
    it('should collect every candidate in order', async () => {
      const source = fakeSource('A', [makeCandidate({ source: 'one' }), makeCandidate({ source: 'two' })]);

      const all = await searchSource(source, META);

      expect(all.map((c) => c.source)).toEqual(['one', 'two']);
    });
  });
});
