import { describeLogStats, formatAge, formatSize } from './log-stats.model';

describe('log stats formatting', () => {
  describe('formatSize', () => {
    it('should print plain bytes below one kilobyte', () => {
      expect(formatSize(0)).toBe('0 B');
      expect(formatSize(1023)).toBe('1023 B');
    });

    it('should use binary units with one decimal', () => {
      expect(formatSize(1024)).toBe('1.0 KB');
      expect(formatSize(1536)).toBe('1.5 KB');
      expect(formatSize(10 * 1024 * 1024)).toBe('10.0 MB');
      expect(formatSize(3 * 1024 * 1024 * 1024)).toBe('3.0 GB');
    });
  });

  describe('formatAge', () => {
    it('should round to the minute', () => {
      expect(formatAge(0)).toBe('0d 0h 0m');
      expect(formatAge(90 * 60 * 1000)).toBe('0d 1h 30m');
      expect(formatAge(29 * 1000)).toBe('0d 0h 0m');
      expect(formatAge(31 * 1000)).toBe('0d 0h 1m');
    });

    it('should carry whole days', () => {
      const ms = ((2 * 24 + 3) * 60 + 15) * 60 * 1000;

      expect(formatAge(ms)).toBe('2d 3h 15m');
    });
  });

  describe('describeLogStats', () => {
    it('should summarise the active and rotated files on one line', () => {
      const line = describeLogStats({
        currentSize: 2048,
        currentAgeMs: 5 * 60 * 1000,
        rotatedCount: 4,
        totalSize: 5 * 1024 * 1024,
      });

      expect(line).toBe(
        'Current: 2.0 KB (age: 0d 0h 5m), Rotated files: 4, Total size: 5.0 MB',
      );
    });
  });
});
