import { TtlCache } from './ttl-cache';

describe('TtlCache', () => {
  let cache: TtlCache<string>;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-02T14:00:00Z'));
    cache = new TtlCache<string>();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('get', () => {
    it('should return not-found for a key that was never set', () => {
      expect(cache.get('missing')).toEqual({ found: false });
    });

    it('should return the value right after set', () => {
      cache.set('most_active_snapshot', 'rows', 60_000);

      expect(cache.get('most_active_snapshot')).toEqual({
        found: true,
        value: 'rows',
      });
    });

    it('should still hit exactly at the TTL boundary', () => {
      cache.set('k', 'v', 1_000);

      jest.advanceTimersByTime(1_000);

      expect(cache.get('k')).toEqual({ found: true, value: 'v' });
    });

    it('should miss one millisecond past the TTL', () => {
      cache.set('k', 'v', 1_000);

      jest.advanceTimersByTime(1_001);

      expect(cache.get('k')).toEqual({ found: false });
    });

    it('should remove an expired entry instead of hiding it', () => {
      cache.set('k', 'v', 1_000);
      jest.advanceTimersByTime(5_000);

      expect(cache.size).toBe(1);
      expect(cache.get('k').found).toBe(false);
      expect(cache.size).toBe(0);
      expect(cache.get('k').found).toBe(false);
    });

    it('should serve a 2s entry at t=1s and drop it at t=3s', () => {
      cache.set('k', 'v', 2_000);

      jest.advanceTimersByTime(1_000);
      expect(cache.get('k')).toEqual({ found: true, value: 'v' });

      jest.advanceTimersByTime(2_000);
      expect(cache.get('k')).toEqual({ found: false });
    });
  });

  describe('set', () => {
    it('should overwrite an existing entry and restart its TTL', () => {
      cache.set('k', 'old', 1_000);
      jest.advanceTimersByTime(900);

      cache.set('k', 'new', 1_000);
      jest.advanceTimersByTime(900);

      expect(cache.get('k')).toEqual({ found: true, value: 'new' });
    });

    it('should keep each entry on its own TTL', () => {
      cache.set('short', 'a', 1_000);
      cache.set('long', 'b', 10_000);

      jest.advanceTimersByTime(5_000);

      expect(cache.get('short').found).toBe(false);
      expect(cache.get('long')).toEqual({ found: true, value: 'b' });
    });

    it('should not touch other keys', () => {
      cache.set('a', 'first', 1_000);
      cache.set('b', 'second', 1_000);
      cache.set('a', 'third', 1_000);

      expect(cache.get('b')).toEqual({ found: true, value: 'second' });
    });
  });

  describe('delete', () => {
    it('should remove a live key', () => {
      cache.set('k', 'v', 60_000);

      cache.delete('k');

      expect(cache.get('k').found).toBe(false);
    });

    it('should be a no-op for an absent key', () => {
      cache.set('other', 'v', 60_000);

      expect(() => cache.delete('absent')).not.toThrow();
      expect(cache.get('other')).toEqual({ found: true, value: 'v' });
    });
  });

  describe('with an injected clock', () => {
    it('should measure expiry against the clock it was given', () => {
      let now = 0;
      const clocked = new TtlCache<number[]>({ now: () => now });
      clocked.set('quotes', [1, 2, 3], 500);

      now = 500;
      expect(clocked.get('quotes')).toEqual({ found: true, value: [1, 2, 3] });

      now = 501;
      expect(clocked.get('quotes')).toEqual({ found: false });
    });
  });
});
