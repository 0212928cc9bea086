/**
 * Reference data layout and loading settings.
 *
 * A PLATEAU dataset directory looks like:
 *
 *   {baseDir}/codelists/Building_usage.xml ...
 *   {baseDir}/specification/<product specification>.xlsx
 */
import { resolve } from 'node:path';
import { DEFAULT_SPEC_SHEET } from './core/spec-table.js';

export interface ReferenceDataConfig {
  baseDir: string;
  /** Relative to baseDir unless absolute */
  codelistsDir: string;
  specificationDir: string;
  specificationSheet: string;
  /**
   * Published codelist URLs (e.g. https://www.geospatial.jp/iur/codelists/3.0/Building_usage.xml)
   * used for keys the dataset's own codelists don't cover
   */
  codelistUrls: string[];
  /** Codelists loaded at once */
  concurrency: number;
  /** Directory caching remote codelists (e.g. data/cache/codelists); no cache when null */
  cacheDir: string | null;
  cacheMaxAgeHours: number;
}

export const DEFAULT_CONFIG: Omit<ReferenceDataConfig, 'baseDir'> = {
  codelistsDir: 'codelists',
  specificationDir: 'specification',
  specificationSheet: DEFAULT_SPEC_SHEET,
  codelistUrls: [],
  concurrency: 8,
  cacheDir: null,
  cacheMaxAgeHours: 24,
};

function positiveNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

/**
 * Resolve settings from overrides, then CODEBOOK_* environment variables,
 * then defaults. CODEBOOK_CODELIST_URLS is comma-separated.
 */
export function loadConfig(
  overrides: Partial<ReferenceDataConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ReferenceDataConfig {
  const baseDir = overrides.baseDir ?? env.CODEBOOK_BASE_DIR;
  if (!baseDir) {
    throw new Error(
      'No reference data directory. Pass baseDir or set CODEBOOK_BASE_DIR.'
    );
  }

  return {
    ...DEFAULT_CONFIG,
    codelistUrls: (env.CODEBOOK_CODELIST_URLS ?? '')
      .split(',')
      .map((url) => url.trim())
      .filter((url) => url !== ''),
    concurrency:
      positiveNumber('CODEBOOK_CONCURRENCY', env.CODEBOOK_CONCURRENCY) ??
      DEFAULT_CONFIG.concurrency,
    cacheDir: env.CODEBOOK_CACHE_DIR || DEFAULT_CONFIG.cacheDir,
    cacheMaxAgeHours:
      positiveNumber('CODEBOOK_CACHE_MAX_AGE_HOURS', env.CODEBOOK_CACHE_MAX_AGE_HOURS) ??
      DEFAULT_CONFIG.cacheMaxAgeHours,
    ...overrides,
    baseDir,
  };
}

export function codelistsPath(config: ReferenceDataConfig): string {
  return resolve(config.baseDir, config.codelistsDir);
}

export function specificationPath(config: ReferenceDataConfig): string {
  return resolve(config.baseDir, config.specificationDir);
}
