/**
 * Loading the attribute specification table.
 *
 * PLATEAU datasets ship the product specification's attribute list as a
 * workbook under `specification/`. The relevant sheet has a two-row header
 * followed by one row per feature/attribute. A tab-separated export of the
 * same sheet is accepted too.
 */
import * as XLSX from 'xlsx';
import { parse } from 'csv-parse/sync';
import { readFile, readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { AttributeSpecTree, SPEC_COLUMN_COUNT } from './attribute-spec-tree.js';
import { isMissingPath, ReferenceDataMissingError, SpecTableError } from './errors.js';

export const DEFAULT_SPEC_SHEET = 'A.3.1_取得項目一覧';
export const HEADER_ROW_COUNT = 2;

const WORKBOOK_EXTENSIONS = ['.xlsx'];
const TEXT_EXTENSIONS = ['.txt', '.tsv'];

// ============================================================================
// Discovery
// ============================================================================

async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (error) {
    if (isMissingPath(error)) {
      throw new ReferenceDataMissingError(dir, 'Specification directory not found');
    }
    throw error;
  }
}

/**
 * The single specification file directly under `dir`.
 * A workbook is preferred; a tab-separated export is used when there is none.
 */
export async function findSpecificationFile(dir: string): Promise<string> {
  const files = await listFiles(dir);

  for (const extensions of [WORKBOOK_EXTENSIONS, TEXT_EXTENSIONS]) {
    const matches = files.filter((f) => extensions.includes(extname(f).toLowerCase()));
    if (matches.length > 1) {
      throw new ReferenceDataMissingError(
        dir,
        `Multiple specification files (${matches.join(', ')})`
      );
    }
    if (matches.length === 1) {
      return join(dir, matches[0]);
    }
  }

  throw new ReferenceDataMissingError(dir, 'No specification file found');
}

// ============================================================================
// Row Extraction
// ============================================================================

function checkHeader(rows: unknown[][], source: string): void {
  if (rows.length < HEADER_ROW_COUNT) {
    throw new SpecTableError(source, `expected ${HEADER_ROW_COUNT} header rows`);
  }
  const width = Math.max(...rows.slice(0, HEADER_ROW_COUNT).map((r) => r.length));
  if (width < SPEC_COLUMN_COUNT) {
    throw new SpecTableError(
      source,
      `expected at least ${SPEC_COLUMN_COUNT} columns, found ${width}`
    );
  }
}

function isBlankRow(row: unknown[]): boolean {
  return row.every((cell) => cell === null || cell === undefined || String(cell).trim() === '');
}

function dataRows(rows: unknown[][], source: string): unknown[][] {
  checkHeader(rows, source);
  return rows.slice(HEADER_ROW_COUNT).filter((row) => !isBlankRow(row));
}

/**
 * Data rows of one workbook sheet, header rows removed.
 */
export function readWorkbookRows(
  workbook: XLSX.WorkBook,
  sheetName: string = DEFAULT_SPEC_SHEET,
  source = '<workbook>'
): unknown[][] {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new SpecTableError(
      source,
      `sheet "${sheetName}" not found (sheets: ${workbook.SheetNames.join(', ')})`
    );
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: false,
    blankrows: false,
  });
  return dataRows(rows, source);
}

/**
 * Data rows of a tab-separated export, header rows removed.
 */
export function readDelimitedRows(text: string, source = '<text>'): unknown[][] {
  const parsed: unknown = parse(text, {
    delimiter: '\t',
    quote: '"',
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(parsed) || !parsed.every(Array.isArray)) {
    throw new SpecTableError(source, 'not a delimited table');
  }
  return dataRows(parsed, source);
}

export async function readSpecRows(
  path: string,
  sheetName: string = DEFAULT_SPEC_SHEET
): Promise<unknown[][]> {
  if (TEXT_EXTENSIONS.includes(extname(path).toLowerCase())) {
    return readDelimitedRows(await readFile(path, 'utf-8'), path);
  }
  const workbook = XLSX.read(await readFile(path), { type: 'buffer' });
  return readWorkbookRows(workbook, sheetName, path);
}

// ============================================================================
// Tree Loading
// ============================================================================

/**
 * Build the spec tree from the specification file in `dir`.
 *
 * A missing or ambiguous file yields an empty tree and a warning. A file
 * that is there but malformed throws SpecTableError.
 */
export async function loadAttributeSpecTree(
  dir: string,
  sheetName: string = DEFAULT_SPEC_SHEET
): Promise<AttributeSpecTree> {
  let path: string;
  try {
    path = await findSpecificationFile(dir);
  } catch (error) {
    if (error instanceof ReferenceDataMissingError) {
      console.warn(`${error.message}. Attribute descriptions are unavailable.`);
      return AttributeSpecTree.empty(dir);
    }
    throw error;
  }

  console.log(`Reading specification ${path}...`);
  const rows = await readSpecRows(path, sheetName);
  const tree = AttributeSpecTree.fromRows(rows, path);
  console.log(`  ${tree.size} spec nodes in ${tree.roots().length} features`);
  return tree;
}
