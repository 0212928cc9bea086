/**
 * Unit tests for the codelist file cache.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { CodelistCache, isStale, type CachedCodelist } from '../cache.js';
import { makeTempDir, removeDir, writeFixture } from './fixtures.js';

const URL_A = 'https://example.com/codelists/Building_usage.xml';
const URL_B = 'https://example.com/codelists/Common_localPublicAuthorities.xml';

function entryFile(dir: string, source: string): string {
  return join(dir, `${encodeURIComponent(source)}.json`);
}

describe('CodelistCache', () => {
  let dir: string;
  let cache: CodelistCache;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await makeTempDir();
    cache = new CodelistCache(join(dir, 'cache'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('returns null for an unknown source', async () => {
    expect(await cache.get(URL_A)).toBeNull();
  });

  it('stores and returns a body with its etag', async () => {
    await cache.put(URL_A, '<xml/>', '"abc"');

    const cached = await cache.get(URL_A);
    expect(cached?.source).toBe(URL_A);
    expect(cached?.body).toBe('<xml/>');
    expect(cached?.etag).toBe('"abc"');
    expect(cached?.fetchedAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('creates the cache directory on first write', async () => {
    expect(existsSync(cache.dir)).toBe(false);

    await cache.put(URL_A, '<a/>');

    expect(existsSync(entryFile(cache.dir, URL_A))).toBe(true);
  });

  it('replaces an existing entry', async () => {
    await cache.put(URL_A, '<old/>', '"1"');
    await cache.put(URL_A, '<new/>');

    const cached = await cache.get(URL_A);
    expect(cached?.body).toBe('<new/>');
    expect(cached?.etag).toBeNull();
    expect((await cache.getStats()).codelistCount).toBe(1);
  });

  it('deletes an entry', async () => {
    await cache.put(URL_A, '<a/>');
    await cache.put(URL_B, '<b/>');

    await cache.delete(URL_A);
    await cache.delete(URL_A);

    expect(await cache.get(URL_A)).toBeNull();
    expect((await cache.get(URL_B))?.body).toBe('<b/>');
  });

  it('ignores an entry that is not valid JSON', async () => {
    await writeFixture(entryFile(cache.dir, URL_A), '{"source":');

    expect(await cache.get(URL_A)).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(`  Ignoring unreadable cache entry for ${URL_A}`);
  });

  it('ignores an entry with the wrong shape', async () => {
    await writeFixture(
      entryFile(cache.dir, URL_A),
      JSON.stringify({ source: URL_A, body: '<a/>', fetchedAt: 12 })
    );

    expect(await cache.get(URL_A)).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('ignores an entry recorded for another source', async () => {
    await writeFixture(
      entryFile(cache.dir, URL_A),
      JSON.stringify({ source: URL_B, body: '<b/>', etag: null, fetchedAt: new Date().toISOString() })
    );

    expect(await cache.get(URL_A)).toBeNull();
  });

  describe('needsRefresh', () => {
    it('is true for an uncached source', async () => {
      expect(await cache.needsRefresh(URL_A)).toBe(true);
    });

    it('is false for a freshly stored source', async () => {
      await cache.put(URL_A, '<a/>');
      expect(await cache.needsRefresh(URL_A, 24)).toBe(false);
    });

    it('is true once the entry is older than the max age', async () => {
      await cache.put(URL_A, '<a/>');
      expect(await cache.needsRefresh(URL_A, -1)).toBe(true);
    });
  });

  it('reports stats', async () => {
    await cache.put(URL_A, '<a/>');
    await cache.put(URL_B, '<b/>');
    await writeFixture(join(cache.dir, 'notes.txt'), 'not an entry');

    const stats = await cache.getStats();
    expect(stats.codelistCount).toBe(2);
    expect(stats.sizeBytes).toBeGreaterThan(0);
  });

  it('reports empty stats before anything is cached', async () => {
    expect(await cache.getStats()).toEqual({ codelistCount: 0, sizeBytes: 0 });
  });

  it('persists across instances', async () => {
    await cache.put(URL_A, '<a/>');

    const reopened = new CodelistCache(cache.dir);
    expect((await reopened.get(URL_A))?.body).toBe('<a/>');
  });
});

describe('isStale', () => {
  const entry: CachedCodelist = {
    source: URL_A,
    body: '<a/>',
    etag: null,
    fetchedAt: '2024-04-01T00:00:00.000Z',
  };
  const fetchedAt = Date.parse(entry.fetchedAt);

  it('is false within the max age', () => {
    expect(isStale(entry, 24, fetchedAt + 23 * 60 * 60 * 1000)).toBe(false);
    expect(isStale(entry, 24, fetchedAt + 24 * 60 * 60 * 1000)).toBe(false);
  });

  it('is true past the max age', () => {
    expect(isStale(entry, 24, fetchedAt + 25 * 60 * 60 * 1000)).toBe(true);
  });

  it('treats an unparseable timestamp as stale', () => {
    expect(isStale({ ...entry, fetchedAt: 'yesterday' }, 24, fetchedAt)).toBe(true);
  });
});
