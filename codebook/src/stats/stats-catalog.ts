/**
 * All stats files under a directory, read through the reference data.
 */
import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage, isMissingPath, ReferenceDataMissingError, StatsFileError } from '../core/errors.js';
import { mergeFrequencyTables, type FrequencyTable } from '../core/frequency-resolver.js';
import type { ReferenceData } from '../reference-data.js';
import { LayerStatsFile, type NumericFieldStats } from './layer-stats.js';

export const STATS_FILE_SUFFIX = '.stat.json';

export interface NumericFieldSummary {
  name: string;
  description: string | null;
  stats: NumericFieldStats;
}

export interface StringFieldSummary {
  name: string;
  description: string | null;
  frequencies: Readonly<FrequencyTable>;
  resolved: Readonly<FrequencyTable>;
}

export interface LayerSummary {
  name: string;
  featureCount: number | null;
  numericFields: NumericFieldSummary[];
  stringFields: StringFieldSummary[];
}

export interface StatsFileSummary {
  path: string;
  source: string;
  driver: string | null;
  layers: LayerSummary[];
}

/**
 * Every `*.stat.json` under `dir`, at any depth, sorted.
 */
export async function findStatsFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingPath(error)) {
      throw new ReferenceDataMissingError(dir, 'Stats directory not found');
    }
    throw error;
  }

  const found: string[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findStatsFiles(path)));
    } else if (entry.isFile() && entry.name.endsWith(STATS_FILE_SUFFIX)) {
      found.push(path);
    }
  }
  return found.sort();
}

export class StatsCatalog {
  readonly files: readonly LayerStatsFile[];
  private readonly reference: ReferenceData;

  constructor(files: LayerStatsFile[], reference: ReferenceData) {
    this.files = files;
    this.reference = reference;
  }

  /**
   * Load every stats file under `dir`. Files that fail validation are
   * logged and skipped.
   */
  static async open(dir: string, reference: ReferenceData): Promise<StatsCatalog> {
    const paths = await findStatsFiles(dir);
    if (paths.length === 0) {
      console.warn(`No ${STATS_FILE_SUFFIX} files found under ${dir}`);
    }

    const files: LayerStatsFile[] = [];
    for (const path of paths) {
      try {
        files.push(await LayerStatsFile.load(path));
      } catch (error) {
        if (!(error instanceof StatsFileError)) throw error;
        console.warn(`  Skipping ${errorMessage(error)}`);
      }
    }
    return new StatsCatalog(files, reference);
  }

  private file(fileIndex: number): LayerStatsFile {
    const file = this.files[fileIndex];
    if (!file) {
      throw new RangeError(`No stats file ${fileIndex}`);
    }
    return file;
  }

  describeField(layerName: string, field: string): string | null {
    return this.reference.specTree.describe(layerName, field) || null;
  }

  /**
   * A string field's frequencies with codes replaced by their meanings.
   */
  resolvedFrequencies(
    fileIndex: number,
    layerIndex: number,
    field: string
  ): Readonly<FrequencyTable> | undefined {
    const file = this.file(fileIndex);
    const raw = file.stringFrequencies(layerIndex, field);
    if (!raw) return undefined;
    return this.reference.resolver.resolve(file.layerName(layerIndex), field, raw);
  }

  /**
   * Resolved frequencies of a field summed over every layer named
   * `layerName` in every file.
   */
  layerFrequencies(layerName: string, field: string): FrequencyTable {
    const tables: Array<Readonly<FrequencyTable>> = [];
    this.files.forEach((file, fileIndex) => {
      for (let layerIndex = 0; layerIndex < file.layerCount; layerIndex++) {
        if (file.layerName(layerIndex) !== layerName) continue;
        const resolved = this.resolvedFrequencies(fileIndex, layerIndex, field);
        if (resolved) tables.push(resolved);
      }
    });
    return mergeFrequencyTables(tables);
  }

  summarize(): StatsFileSummary[] {
    return this.files.map((file, fileIndex) => ({
      path: file.path,
      source: file.source,
      driver: file.driver,
      layers: file.layerNames().map((name, layerIndex): LayerSummary => ({
        name,
        featureCount: file.featureCount(layerIndex),
        numericFields: file.numericFieldNames(layerIndex).flatMap((field) => {
          const stats = file.numericField(layerIndex, field);
          return stats
            ? [{ name: field, description: this.describeField(name, field), stats }]
            : [];
        }),
        stringFields: file.stringFieldNames(layerIndex).flatMap((field) => {
          const frequencies = file.stringFrequencies(layerIndex, field);
          const resolved = this.resolvedFrequencies(fileIndex, layerIndex, field);
          return frequencies && resolved
            ? [{ name: field, description: this.describeField(name, field), frequencies, resolved }]
            : [];
        }),
      })),
    }));
  }
}
