/**
 * Errors raised while building reference data.
 *
 * Builders catch these per file, log them and keep going. Resolution
 * itself never throws.
 */

export class DictionaryLoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load codelist ${source}: ${message}`, options);
    this.name = 'DictionaryLoadError';
    this.source = source;
  }
}

export class SpecTableError extends Error {
  readonly source: string;
  /** 0-based data row index, when the problem is tied to a row */
  readonly row: number | null;

  constructor(source: string, message: string, row: number | null = null) {
    super(
      row === null
        ? `Malformed specification table ${source}: ${message}`
        : `Malformed specification table ${source} (row ${row}): ${message}`
    );
    this.name = 'SpecTableError';
    this.source = source;
    this.row = row;
  }
}

export class ReferenceDataMissingError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${message}: ${path}`);
    this.name = 'ReferenceDataMissingError';
    this.path = path;
  }
}

export class StatsFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid stats file ${path}: ${message}`, options);
    this.name = 'StatsFileError';
    this.path = path;
  }
}

/**
 * True for fs errors meaning the path (or a parent of it) doesn't exist.
 */
export function isMissingPath(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
