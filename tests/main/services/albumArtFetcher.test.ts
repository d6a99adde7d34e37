import { describe, it, expect, vi } from 'vitest';
import {
  candidateImageUrls,
  downloadArtwork,
  fetchCoverArtArchiveImage,
  parseCAAListing,
} from '../../../src/main/services/albumArtFetcher';
import { HttpClient } from '../../../src/main/services/httpClient';
import type { BinaryResponse } from '../../../src/main/services/httpClient';
import { APIError } from '../../../src/main/services/errors';
import { imageBytes } from '../../helpers/fakes';

const CAA = 'https://caa.test';
const RELEASE_ID = 'rel-1';

function stubHttp(listing: unknown, images: Record<string, BinaryResponse>): { http: HttpClient; downloads: string[] } {
  const http = new HttpClient();
  const downloads: string[] = [];
  vi.spyOn(http, 'getJson').mockImplementation(() =>
    listing instanceof Error ? Promise.reject(listing) : Promise.resolve(listing),
  );
  vi.spyOn(http, 'getBinary').mockImplementation((url: string) => {
    downloads.push(url);
    const image = images[url];
    return image ? Promise.resolve(image) : Promise.reject(new APIError(`HTTP 404 for ${url}`, { statusCode: 404 }));
  });
  return { http, downloads };
}

describe('albumArtFetcher', () => {
  describe('parseCAAListing', () => {
    it('should read front flags, originals and thumbnails', () => {
      expect(
        parseCAAListing({
          images: [{ front: true, image: 'a.jpg', thumbnails: { large: 'a-500.jpg', small: 'a-250.jpg', '1200': 'a-1200.jpg' } }],
        }),
      ).toEqual([
        {
          front: true,
          image: 'a.jpg',
          thumbnails: { large: 'a-500.jpg', small: 'a-250.jpg', '1200': 'a-1200.jpg' },
        },
      ]);
    });

    it('should return [] for bodies without an image list', () => {
      expect(parseCAAListing(null)).toEqual([]);
      expect(parseCAAListing({ images: 'none' })).toEqual([]);
    });
  });

  describe('candidateImageUrls', () => {
    it('should order front images as large, small, then original', () => {
      const urls = candidateImageUrls([
        { front: false, image: 'back.jpg', thumbnails: { large: 'back-500.jpg' } },
        { front: true, image: 'front.jpg', thumbnails: { large: 'front-500.jpg', small: 'front-250.jpg' } },
      ]);
      expect(urls).toEqual(['front-500.jpg', 'front-250.jpg', 'front.jpg']);
    });

    it('should use every image when none is flagged front', () => {
      const urls = candidateImageUrls([
        { front: false, image: 'one.jpg', thumbnails: {} },
        { front: false, thumbnails: { small: 'two-250.jpg' } },
      ]);
      expect(urls).toEqual(['one.jpg', 'two-250.jpg']);
    });
  });

  describe('downloadArtwork', () => {
    it('should accept an image at exactly the floor', async () => {
      const { http } = stubHttp({}, { 'https://img.test/a': { data: imageBytes(1000), contentType: 'image/png' } });

      await expect(downloadArtwork(http, 'https://img.test/a', 1000)).resolves.toEqual({
        data: imageBytes(1000),
        mimeType: 'image/png',
      });
    });

    it('should reject images below the floor', async () => {
      const { http } = stubHttp({}, { 'https://img.test/a': { data: imageBytes(999), contentType: 'image/png' } });

      await expect(downloadArtwork(http, 'https://img.test/a', 1000)).resolves.toBeNull();
    });

    it('should reject non-image content types', async () => {
      const { http } = stubHttp({}, { 'https://img.test/a': { data: imageBytes(5000), contentType: 'text/html' } });

      await expect(downloadArtwork(http, 'https://img.test/a', 1000)).resolves.toBeNull();
    });

    it('should default a bare "image" type to JPEG', async () => {
      const { http } = stubHttp({}, { 'https://img.test/a': { data: imageBytes(5000), contentType: 'image' } });

      const image = await downloadArtwork(http, 'https://img.test/a', 1000);

      expect(image?.mimeType).toBe('image/jpeg');
    });

    it('should return null when the download fails', async () => {
      const { http } = stubHttp({}, {});

      await expect(downloadArtwork(http, 'https://img.test/missing', 1)).resolves.toBeNull();
    });
  });

  describe('fetchCoverArtArchiveImage', () => {
    const options = { minBytes: 20_000, caaBaseUrl: CAA };

    it('should walk the listing until an image passes the floor', async () => {
      const { http, downloads } = stubHttp(
        { images: [{ front: true, image: `${CAA}/f.jpg`, thumbnails: { large: `${CAA}/f-500.jpg`, small: `${CAA}/f-250.jpg` } }] },
        {
          [`${CAA}/f-500.jpg`]: { data: imageBytes(100), contentType: 'image/jpeg' },
          [`${CAA}/f.jpg`]: { data: imageBytes(20_000), contentType: 'image/jpeg' },
        },
      );

      const image = await fetchCoverArtArchiveImage(http, RELEASE_ID, options);

      expect(image?.data.length).toBe(20_000);
      expect(downloads).toEqual([`${CAA}/f-500.jpg`, `${CAA}/f-250.jpg`, `${CAA}/f.jpg`]);
      expect(http.getJson).toHaveBeenCalledWith(`${CAA}/release/${RELEASE_ID}`);
    });

    it('should fall back to the /front path when the listing is unavailable', async () => {
      const { http, downloads } = stubHttp(new APIError('HTTP 404', { statusCode: 404 }), {
        [`${CAA}/release/${RELEASE_ID}/front`]: { data: imageBytes(30_000), contentType: 'image/jpeg' },
      });

      const image = await fetchCoverArtArchiveImage(http, RELEASE_ID, options);

      expect(image?.data.length).toBe(30_000);
      expect(downloads).toEqual([`${CAA}/release/${RELEASE_ID}/front`]);
    });

    it('should return null when nothing passes', async () => {
      const { http } = stubHttp({ images: [] }, {});

      await expect(fetchCoverArtArchiveImage(http, RELEASE_ID, options)).resolves.toBeNull();
    });
  });
});
