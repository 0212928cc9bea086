/**
 * Per-file layer statistics (`*.stat.json`).
 *
 * One file per source GML file, written by the stats producer:
 * numeric fields get count/min/max/mean and a histogram, string fields get
 * a value → count table.
 */
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { readFile } from 'node:fs/promises';
import { errorMessage, StatsFileError } from '../core/errors.js';
import type { FrequencyTable } from '../core/frequency-resolver.js';

// ============================================================================
// Schema
// ============================================================================

const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

export const NumericFieldStatsSchema = Type.Object({
  count: Type.Number(),
  min: NullableNumber,
  max: NullableNumber,
  mean: NullableNumber,
  histogram: Type.Object({
    bin_edges: Type.Array(Type.Number()),
    counts: Type.Array(Type.Number()),
  }),
});

export const LayerStatsSchema = Type.Object({
  name: Type.String(),
  feature_count: Type.Optional(NullableNumber),
  spatial_ref_wkt: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  numeric_field_stats: Type.Record(Type.String(), NumericFieldStatsSchema),
  string_field_frequencies: Type.Record(
    Type.String(),
    Type.Record(Type.String(), Type.Number())
  ),
});

export const StatsDocumentSchema = Type.Object({
  source: Type.Optional(Type.String()),
  driver: Type.Optional(Type.String()),
  layer_count: Type.Optional(Type.Number()),
  layers: Type.Array(LayerStatsSchema),
});

export type NumericFieldStatsJson = Static<typeof NumericFieldStatsSchema>;
export type LayerStatsJson = Static<typeof LayerStatsSchema>;
export type StatsDocument = Static<typeof StatsDocumentSchema>;

export interface NumericFieldStats {
  count: number;
  min: number | null;
  max: number | null;
  mean: number | null;
  histogram: { binEdges: number[]; counts: number[] };
}

function toNumericFieldStats(json: NumericFieldStatsJson): NumericFieldStats {
  return {
    count: json.count,
    min: json.min,
    max: json.max,
    mean: json.mean,
    histogram: {
      binEdges: json.histogram.bin_edges,
      counts: json.histogram.counts,
    },
  };
}

// ============================================================================
// Stats File
// ============================================================================

export class LayerStatsFile {
  readonly path: string;
  private readonly doc: StatsDocument;

  constructor(path: string, doc: StatsDocument) {
    this.path = path;
    this.doc = doc;
  }

  /**
   * Validate a parsed document and wrap it.
   */
  static fromJson(path: string, json: unknown): LayerStatsFile {
    if (!Value.Check(StatsDocumentSchema, json)) {
      const first = Value.Errors(StatsDocumentSchema, json).First();
      const detail = first ? `${first.path || '/'}: ${first.message}` : 'schema mismatch';
      throw new StatsFileError(path, detail);
    }
    return new LayerStatsFile(path, json);
  }

  static async load(path: string): Promise<LayerStatsFile> {
    let json: unknown;
    try {
      json = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new StatsFileError(path, errorMessage(error), { cause: error });
    }
    return LayerStatsFile.fromJson(path, json);
  }

  /** The GML file the stats were computed from */
  get source(): string {
    return this.doc.source ?? this.path;
  }

  get driver(): string | null {
    return this.doc.driver ?? null;
  }

  get layerCount(): number {
    return this.doc.layers.length;
  }

  private layer(layerIndex: number): LayerStatsJson {
    const layer = this.doc.layers[layerIndex];
    if (!layer) {
      throw new RangeError(`${this.path} has no layer ${layerIndex}`);
    }
    return layer;
  }

  layerName(layerIndex: number): string {
    return this.layer(layerIndex).name;
  }

  layerNames(): string[] {
    return this.doc.layers.map((layer) => layer.name);
  }

  featureCount(layerIndex: number): number | null {
    return this.layer(layerIndex).feature_count ?? null;
  }

  spatialRefWkt(layerIndex: number): string | null {
    return this.layer(layerIndex).spatial_ref_wkt ?? null;
  }

  numericFieldNames(layerIndex: number): string[] {
    return Object.keys(this.layer(layerIndex).numeric_field_stats);
  }

  numericField(layerIndex: number, field: string): NumericFieldStats | undefined {
    const stats = this.layer(layerIndex).numeric_field_stats;
    return Object.hasOwn(stats, field) ? toNumericFieldStats(stats[field]) : undefined;
  }

  stringFieldNames(layerIndex: number): string[] {
    return Object.keys(this.layer(layerIndex).string_field_frequencies);
  }

  /** Raw value → count table of a string field */
  stringFrequencies(layerIndex: number, field: string): Readonly<FrequencyTable> | undefined {
    const frequencies = this.layer(layerIndex).string_field_frequencies;
    return Object.hasOwn(frequencies, field) ? frequencies[field] : undefined;
  }
}
