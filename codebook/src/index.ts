export { CodeDictionary, loadCodeDictionary, parseCodelistXml } from './core/code-dictionary.js';
export type { LoadDictionaryOptions } from './core/code-dictionary.js';
export {
  AttributeSpecTree,
  deepestDepth,
  deepestName,
  localName,
  normalizeRow,
  SPEC_COLUMN_COUNT,
} from './core/attribute-spec-tree.js';
export type { AttributeSpecNode, NodeId, SpecRow } from './core/attribute-spec-tree.js';
export {
  DEFAULT_SPEC_SHEET,
  findSpecificationFile,
  loadAttributeSpecTree,
  readDelimitedRows,
  readSpecRows,
  readWorkbookRows,
} from './core/spec-table.js';
export {
  ADMINISTRATIVE_KEY,
  AttributeDictionaryRegistry,
  codelistKey,
  listCodelistSources,
  parseCodelistFileName,
} from './core/attribute-dictionary-registry.js';
export type { AttributeKey, RegistryBuildOptions } from './core/attribute-dictionary-registry.js';
export {
  decodeLabel,
  flattenLabel,
  FrequencyResolver,
  mergeFrequencyTables,
  relabelFrequencies,
} from './core/frequency-resolver.js';
export type { FrequencyTable, Label } from './core/frequency-resolver.js';
export { CodelistCache, isStale } from './core/cache.js';
export type { CachedCodelist } from './core/cache.js';
export {
  DictionaryLoadError,
  ReferenceDataMissingError,
  SpecTableError,
  StatsFileError,
} from './core/errors.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { ReferenceDataConfig } from './config.js';
export { codelistSources, loadReferenceData } from './reference-data.js';
export type { ReferenceData } from './reference-data.js';
export { LayerStatsFile } from './stats/layer-stats.js';
export type { NumericFieldStats, StatsDocument } from './stats/layer-stats.js';
export { findStatsFiles, StatsCatalog } from './stats/stats-catalog.js';
export type { StatsFileSummary } from './stats/stats-catalog.js';
