import { describe, it, expect, beforeEach } from 'vitest';
import { WorktreeValidityCache } from '../src/context/validityCache.js';

describe('WorktreeValidityCache', () => {
  let now: number;
  let cache: WorktreeValidityCache;

  beforeEach(() => {
    now = 1_000;
    cache = new WorktreeValidityCache(5_000, () => now);
  });

  it('should return stored values until they expire', () => {
    cache.set('/w/acme/feature', true);
    cache.set('/w/acme/broken', false);

    now += 4_999;
    expect(cache.get('/w/acme/feature')).toBe(true);
    expect(cache.get('/w/acme/broken')).toBe(false);

    now += 1;
    expect(cache.get('/w/acme/feature')).toBeUndefined();
    expect(cache.size).toBe(1);
  });

  it('should miss unknown keys', () => {
    expect(cache.get('/w/acme/feature')).toBeUndefined();
  });

  it('should invalidate only entries under the given root', () => {
    cache.set('/w/acme/feature', true);
    cache.set('/w/acme/bugfix', true);
    cache.set('/w/acme-two/feature', true);

    expect(cache.invalidateUnder('/w/acme')).toBe(2);
    expect(cache.get('/w/acme/feature')).toBeUndefined();
    expect(cache.get('/w/acme-two/feature')).toBe(true);
  });

  it('should invalidate an entry equal to the root', () => {
    cache.set('/w/acme/feature', true);
    expect(cache.invalidateUnder('/w/acme/feature')).toBe(1);
  });

  it('should clear everything', () => {
    cache.set('/w/a/b', true);
    cache.set('/w/c/d', false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
