import {
  ProgressRenderer,
  formatEta,
  formatProgressLine,
} from '../src/download/ProgressRenderer';
import { OutputCollector } from './helpers/fakes';

describe('Progress rendering', () => {
  describe('formatEta', () => {
    it.each<[number | undefined, string]>([
      [0, '00:00'],
      [7, '00:07'],
      [65, '01:05'],
      [3725, '1:02:05'],
      [undefined, 'N/A'],
      [-1, 'N/A'],
    ])('renders %p as %s', (seconds, expected) => {
      expect(formatEta(seconds)).toBe(expected);
    });
  });

  describe('formatProgressLine', () => {
    it('shows percentage, size, speed and ETA', () => {
      expect(
        formatProgressLine({
          downloadedBytes: 4404019,
          totalBytes: 10485760,
          speed: 1572864,
          eta: 7,
        }),
      ).toBe('[download]  42.0% of 10.0 MiB at 1.5 MiB/s ETA 00:07');
    });

    it('falls back to N/A for unknown fields', () => {
      expect(formatProgressLine({ downloadedBytes: 100 })).toBe('[download] N/A at N/A ETA N/A');
    });

    it('caps the percentage at 100', () => {
      expect(formatProgressLine({ downloadedBytes: 2048, totalBytes: 1024, eta: 0 })).toBe(
        '[download] 100.0% of 1.0 KiB at N/A ETA 00:00',
      );
    });
  });

  describe('ProgressRenderer', () => {
    it('redraws in place and finishes on a new line', () => {
      const output = new OutputCollector();
      const renderer = new ProgressRenderer(output);
      const first = { downloadedBytes: 512, totalBytes: 1024, speed: 2048, eta: 65 };
      const second = { downloadedBytes: 0 };

      renderer.update(first);
      renderer.update(second);
      renderer.complete('/videos/clip.mp4');

      const firstLine = formatProgressLine(first);
      const secondLine = formatProgressLine(second);
      expect(firstLine).toBe('[download]  50.0% of 1.0 KiB at 2.0 KiB/s ETA 01:05');
      expect(output.text).toBe(
        `\r${firstLine}` +
          `\r${secondLine}${' '.repeat(firstLine.length - secondLine.length)}` +
          '\n[download] Download completed: /videos/clip.mp4\n',
      );
    });

    it('prints only the completion line when no progress was reported', () => {
      const output = new OutputCollector();

      new ProgressRenderer(output).complete('/videos/clip.mp4');

      expect(output.text).toBe('[download] Download completed: /videos/clip.mp4\n');
    });

    it('closes a half-drawn line on abort', () => {
      const output = new OutputCollector();
      const renderer = new ProgressRenderer(output);

      renderer.abort();
      expect(output.text).toBe('');

      renderer.update({ downloadedBytes: 1 });
      renderer.abort();
      expect(output.text).toBe('\r[download] N/A at N/A ETA N/A\n');
    });
  });
});
