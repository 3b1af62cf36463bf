import fc from 'fast-check';
import { filterFormats, isCombinedMp4, listFormats } from '../src/download/FormatLister';
import { RawFormat } from '../src/download/core/types';
import { ExtractionError, NoFormatsAvailableError } from '../src/utils/errors';
import { FakeExtractor, rawFormat, videoInfo } from './helpers/fakes';

const rawFormatArb: fc.Arbitrary<RawFormat> = fc.record({
  formatId: fc.string({ minLength: 1, maxLength: 6 }),
  extension: fc.constantFrom('mp4', 'webm', 'm4a', '3gp'),
  height: fc.option(fc.integer({ min: 144, max: 4320 }), { nil: undefined }),
  vcodec: fc.constantFrom('avc1', 'vp9', 'none', undefined),
  acodec: fc.constantFrom('mp4a', 'opus', 'none', undefined),
  filesize: fc.option(fc.integer({ min: 1, max: 5_000_000_000 }), { nil: undefined }),
});

describe('Format Lister', () => {
  describe('isCombinedMp4', () => {
    it('requires mp4 with both streams and a height', () => {
      expect(isCombinedMp4(rawFormat('18', 360))).toBe(true);
      expect(isCombinedMp4(rawFormat('43', 360, { extension: 'webm' }))).toBe(false);
      expect(isCombinedMp4(rawFormat('137', 1080, { acodec: 'none' }))).toBe(false);
      expect(isCombinedMp4(rawFormat('140', undefined, { vcodec: 'none' }))).toBe(false);
      expect(isCombinedMp4(rawFormat('x', undefined))).toBe(false);
    });
  });

  describe('filterFormats', () => {
    it('keeps the best mp4 per resolution, highest first', () => {
      const formats = [
        rawFormat('a', 720, { filesize: 100 }),
        rawFormat('b', 720, { filesize: 200 }),
        rawFormat('c', 1080, { extension: 'webm' }),
        rawFormat('d', 1080, { acodec: 'none' }),
        rawFormat('e', 360),
        rawFormat('f', undefined),
        rawFormat('g', 1080, { fps: 60 }),
      ];

      const result = filterFormats(formats);

      expect(result.map((f) => f.formatId)).toEqual(['g', 'b', 'e']);
      expect(result.map((f) => f.resolution)).toEqual(['1080p', '720p', '360p']);
      expect(result[0]).toEqual({
        formatId: 'g',
        resolution: '1080p',
        height: 1080,
        container: 'mp4',
        hasVideo: true,
        hasAudio: true,
        filesize: undefined,
        fps: 60,
      });
    });

    it('breaks size ties by bitrate', () => {
      const result = filterFormats([
        rawFormat('low', 480, { filesize: 10, bitrate: 300 }),
        rawFormat('high', 480, { filesize: 10, bitrate: 900 }),
      ]);

      expect(result.map((f) => f.formatId)).toEqual(['high']);
    });

    it('always yields combined mp4 formats in strictly descending resolution', () => {
      fc.assert(
        fc.property(fc.array(rawFormatArb, { maxLength: 40 }), (formats) => {
          const result = filterFormats(formats);

          for (const format of result) {
            expect(format.container).toBe('mp4');
            expect(format.hasVideo && format.hasAudio).toBe(true);
          }
          for (let i = 1; i < result.length; i++) {
            expect(result[i - 1].height).toBeGreaterThan(result[i].height);
          }
        }),
        { numRuns: 200 },
      );
    });
  });

  describe('listFormats', () => {
    it('returns the title and the filtered list', async () => {
      const extractor = new FakeExtractor(
        videoInfo([rawFormat('18', 360), rawFormat('22', 720)], 'Clip'),
      );

      const listing = await listFormats(extractor, 'https://youtu.be/abc123');

      expect(listing.title).toBe('Clip');
      expect(listing.formats.map((f) => f.resolution)).toEqual(['720p', '360p']);
    });

    it('wraps extractor failures in ExtractionError', async () => {
      const extractor = new FakeExtractor(videoInfo([]), {
        infoError: new Error('Video unavailable'),
      });

      const promise = listFormats(extractor, 'https://youtu.be/gone');

      await expect(promise).rejects.toBeInstanceOf(ExtractionError);
      await expect(promise).rejects.toThrow('Failed to fetch video info: Video unavailable');
    });

    it('fails with NoFormatsAvailableError when nothing qualifies', async () => {
      const extractor = new FakeExtractor(
        videoInfo([rawFormat('251', undefined, { extension: 'webm', vcodec: 'none' })]),
      );

      await expect(listFormats(extractor, 'https://youtu.be/abc123')).rejects.toBeInstanceOf(
        NoFormatsAvailableError,
      );
    });
  });
});
