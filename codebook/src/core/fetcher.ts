/**
 * Source reading for reference data.
 * Remote codelists are fetched with retry; local files are read directly.
 * Batches of sources load with bounded concurrency.
 */
import pLimit from 'p-limit';
import { readFile } from 'node:fs/promises';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface FetchedText {
  body: string;
  etag: string | null;
  /** The server answered 304 to If-None-Match; `body` is empty */
  notModified: boolean;
}

export interface LoadProgress {
  loaded: number;
  total: number;
  source: string;
}

export interface LoadAllOptions {
  concurrency?: number;
  onProgress?: (progress: LoadProgress) => void;
}

export type SettledLoad<T> =
  | { source: string; ok: true; value: T }
  | { source: string; ok: false; error: unknown };

// ============================================================================
// Retry Logic
// ============================================================================

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * GET `url` as text. With `etag`, the request is conditional and a 304
 * comes back as `notModified`.
 */
export async function fetchTextWithRetry(
  url: string,
  options: RetryOptions = DEFAULT_RETRY,
  etag: string | null = null
): Promise<FetchedText> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      const res = etag === null
        ? await fetch(url)
        : await fetch(url, { headers: { 'If-None-Match': etag } });
      if (etag !== null && res.status === 304) {
        return { body: '', etag, notModified: true };
      }
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}: ${await res.text()}`);
      }
      return { body: await res.text(), etag: res.headers.get('etag'), notModified: false };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt < options.maxRetries) {
        const delay = Math.min(
          options.baseDelayMs * Math.pow(2, attempt),
          options.maxDelayMs
        );
        console.warn(
          `Fetch failed (attempt ${attempt + 1}/${options.maxRetries + 1}): ${lastError.message}. Retrying in ${delay}ms...`
        );
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error(`Fetch failed: ${url}`);
}

/**
 * Read a source as UTF-8 text, over HTTP(S) or from disk.
 */
export async function readSourceText(
  source: string,
  retry: RetryOptions = DEFAULT_RETRY
): Promise<FetchedText> {
  if (isRemoteSource(source)) {
    return fetchTextWithRetry(source, retry);
  }
  return { body: await readFile(source, 'utf-8'), etag: null, notModified: false };
}

// ============================================================================
// Batch Loading
// ============================================================================

/**
 * Load every source with at most `concurrency` loads in flight.
 * Results keep the order of `sources`; failures are returned, not thrown.
 */
export async function loadAll<T>(
  sources: string[],
  load: (source: string) => Promise<T>,
  options: LoadAllOptions = {}
): Promise<SettledLoad<T>[]> {
  const { concurrency = 8, onProgress } = options;
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  let loaded = 0;

  return Promise.all(
    sources.map((source) =>
      limit(async (): Promise<SettledLoad<T>> => {
        let result: SettledLoad<T>;
        try {
          result = { source, ok: true, value: await load(source) };
        } catch (error) {
          result = { source, ok: false, error };
        }
        loaded++;
        onProgress?.({ loaded, total: sources.length, source });
        return result;
      })
    )
  );
}
