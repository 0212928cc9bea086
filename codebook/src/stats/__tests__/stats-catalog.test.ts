/**
 * Unit tests for the stats catalog.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { findStatsFiles, StatsCatalog } from '../stats-catalog.js';
import { AttributeDictionaryRegistry } from '../../core/attribute-dictionary-registry.js';
import { AttributeSpecTree } from '../../core/attribute-spec-tree.js';
import { FrequencyResolver } from '../../core/frequency-resolver.js';
import { ReferenceDataMissingError } from '../../core/errors.js';
import type { ReferenceData } from '../../reference-data.js';
import { dictionary, makeTempDir, removeDir, writeFixture } from '../../core/__tests__/fixtures.js';
import { BUILDING_STATS } from './fixtures.js';

function referenceData(): ReferenceData {
  const registry = AttributeDictionaryRegistry.fromEntries([
    [
      { feature: 'Building', attribute: 'usage' },
      dictionary('Building_usage.xml', { '401': '住宅', '402': '商業' }),
    ],
  ]);
  const specTree = AttributeSpecTree.fromRows([
    ['bldg', 'bldg:Building', '', '', '', '', '地物', '建築物'],
    ['bldg', '', 'bldg:usage', '', '', '', '主題属性', '建築物の主な使い道'],
    ['bldg', '', 'bldg:measuredHeight', '', '', '', '主題属性', '計測高さ'],
    ['gml', '', 'gml:name', '', '', '', '主題属性', ''],
  ]);
  return { registry, specTree, resolver: new FrequencyResolver(registry) };
}

const SECOND_BUILDING_FILE = {
  source: 'udx/bldg/53394612_bldg_6697_op.gml',
  layers: [
    {
      name: 'Building',
      numeric_field_stats: {},
      string_field_frequencies: { usage: { '402': 7, '999': 1 } },
    },
  ],
};

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('findStatsFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('finds stats files at any depth, sorted', async () => {
    await writeFixture(join(dir, 'bldg', 'b.stat.json'), '{}');
    await writeFixture(join(dir, 'bldg', 'a.stat.json'), '{}');
    await writeFixture(join(dir, 'tran', 'deep', 'c.stat.json'), '{}');
    await writeFixture(join(dir, 'bldg', 'a.gml'), '<x/>');
    await writeFixture(join(dir, 'stat.json'), '{}');

    expect(await findStatsFiles(dir)).toEqual([
      join(dir, 'bldg', 'a.stat.json'),
      join(dir, 'bldg', 'b.stat.json'),
      join(dir, 'tran', 'deep', 'c.stat.json'),
    ]);
  });

  it('rejects a missing directory', async () => {
    await expect(findStatsFiles(join(dir, 'udx'))).rejects.toThrow(ReferenceDataMissingError);
  });
});

describe('StatsCatalog', () => {
  let dir: string;
  let catalog: StatsCatalog;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFixture(join(dir, 'bldg', 'a.stat.json'), JSON.stringify(BUILDING_STATS));
    await writeFixture(join(dir, 'bldg', 'b.stat.json'), JSON.stringify(SECOND_BUILDING_FILE));
    await writeFixture(join(dir, 'bldg', 'c.stat.json'), '{"layers": "none"}');
    catalog = await StatsCatalog.open(dir, referenceData());
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('skips files that fail validation', () => {
    expect(catalog.files.map((f) => f.path)).toEqual([
      join(dir, 'bldg', 'a.stat.json'),
      join(dir, 'bldg', 'b.stat.json'),
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('resolves one file layer field', () => {
    expect(catalog.resolvedFrequencies(0, 0, 'usage')).toEqual({ 住宅: 125, 商業: 5 });
    expect(catalog.resolvedFrequencies(0, 0, 'name')).toEqual({ 東京駅: 1 });
    expect(catalog.resolvedFrequencies(0, 0, 'missing')).toBeUndefined();
  });

  it('rejects unknown file indexes', () => {
    expect(() => catalog.resolvedFrequencies(5, 0, 'usage')).toThrow(RangeError);
  });

  it('merges a field across every file', () => {
    expect(catalog.layerFrequencies('Building', 'usage')).toEqual({
      住宅: 125,
      商業: 12,
      '999': 1,
    });
    expect(catalog.layerFrequencies('Road', 'usage')).toEqual({});
  });

  it('describes fields from the spec tree', () => {
    expect(catalog.describeField('Building', 'usage')).toBe('建築物の主な使い道');
    expect(catalog.describeField('Building', 'name')).toBeNull();
    expect(catalog.describeField('Building', 'storeysAboveGround')).toBeNull();
  });

  it('summarizes every file', () => {
    const [first, second] = catalog.summarize();

    expect(first.source).toBe('udx/bldg/53394611_bldg_6697_op.gml');
    expect(first.driver).toBe('GML');
    expect(first.layers).toHaveLength(1);

    const [building] = first.layers;
    expect(building.name).toBe('Building');
    expect(building.featureCount).toBe(125);
    expect(building.numericFields.map((f) => [f.name, f.description])).toEqual([
      ['measuredHeight', '計測高さ'],
      ['storeysAboveGround', null],
    ]);
    expect(building.stringFields[0]).toEqual({
      name: 'usage',
      description: '建築物の主な使い道',
      frequencies: { '401': 120, '[401, 402]': 5 },
      resolved: { 住宅: 125, 商業: 5 },
    });

    expect(second.source).toBe('udx/bldg/53394612_bldg_6697_op.gml');
    expect(second.driver).toBeNull();
    expect(second.layers[0].stringFields[0].resolved).toEqual({ 商業: 7, '999': 1 });
  });
});

describe('StatsCatalog.open', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('warns when there are no stats files', async () => {
    const catalog = await StatsCatalog.open(dir, referenceData());

    expect(catalog.files).toHaveLength(0);
    expect(catalog.summarize()).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith(`No .stat.json files found under ${dir}`);
  });
});
