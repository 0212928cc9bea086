/**
 * File cache for remote codelist documents.
 * One JSON file per source URL holding the XML body, ETag and fetch time,
 * so repeated registry builds don't refetch published codelists and stale
 * entries can be revalidated with If-None-Match.
 */
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isMissingPath } from './errors.js';

// ============================================================================
// Types
// ============================================================================

const CachedCodelistSchema = Type.Object({
  source: Type.String(),
  body: Type.String(),
  etag: Type.Union([Type.String(), Type.Null()]),
  /** ISO 8601 */
  fetchedAt: Type.String(),
});

export type CachedCodelist = Static<typeof CachedCodelistSchema>;

export interface CacheStats {
  codelistCount: number;
  sizeBytes: number;
}

const ENTRY_EXTENSION = '.json';

/**
 * True when the entry is older than `maxAgeHours`.
 */
export function isStale(entry: CachedCodelist, maxAgeHours = 24, now = Date.now()): boolean {
  const ageHours = (now - Date.parse(entry.fetchedAt)) / (1000 * 60 * 60);
  return !(ageHours <= maxAgeHours);
}

// ============================================================================
// Cache Implementation
// ============================================================================

export class CodelistCache {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  private entryPath(source: string): string {
    return join(this.dir, `${encodeURIComponent(source)}${ENTRY_EXTENSION}`);
  }

  /**
   * The cached entry, or null when there is none or it can't be read back.
   */
  async get(source: string): Promise<CachedCodelist | null> {
    let text: string;
    try {
      text = await readFile(this.entryPath(source), 'utf-8');
    } catch (error) {
      if (isMissingPath(error)) return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      console.warn(`  Ignoring unreadable cache entry for ${source}`);
      return null;
    }
    if (!Value.Check(CachedCodelistSchema, json) || json.source !== source) {
      console.warn(`  Ignoring unreadable cache entry for ${source}`);
      return null;
    }
    return json;
  }

  async put(source: string, body: string, etag: string | null = null): Promise<CachedCodelist> {
    const entry: CachedCodelist = {
      source,
      body,
      etag,
      fetchedAt: new Date().toISOString(),
    };
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.entryPath(source), JSON.stringify(entry));
    return entry;
  }

  async delete(source: string): Promise<void> {
    await rm(this.entryPath(source), { force: true });
  }

  /**
   * Check if a cached codelist is missing or older than `maxAgeHours`.
   */
  async needsRefresh(source: string, maxAgeHours = 24): Promise<boolean> {
    const cached = await this.get(source);
    return cached === null || isStale(cached, maxAgeHours);
  }

  async getStats(): Promise<CacheStats> {
    let names: string[];
    try {
      names = (await readdir(this.dir)).filter((name) => name.endsWith(ENTRY_EXTENSION));
    } catch (error) {
      if (isMissingPath(error)) return { codelistCount: 0, sizeBytes: 0 };
      throw error;
    }

    let sizeBytes = 0;
    for (const name of names) {
      sizeBytes += (await stat(join(this.dir, name))).size;
    }
    return { codelistCount: names.length, sizeBytes };
  }
}
