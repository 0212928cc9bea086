/**
 * Build the codelist registry and spec tree for one dataset directory.
 */
import {
  AttributeDictionaryRegistry,
  codelistKey,
  listCodelistSources,
} from './core/attribute-dictionary-registry.js';
import type { AttributeSpecTree } from './core/attribute-spec-tree.js';
import { CodelistCache } from './core/cache.js';
import { FrequencyResolver } from './core/frequency-resolver.js';
import { loadAttributeSpecTree } from './core/spec-table.js';
import { codelistsPath, specificationPath, type ReferenceDataConfig } from './config.js';

export interface ReferenceData {
  registry: AttributeDictionaryRegistry;
  specTree: AttributeSpecTree;
  resolver: FrequencyResolver;
}

function keyName(source: string): string | null {
  const key = codelistKey(source);
  return key ? `${key.feature}_${key.attribute}` : null;
}

/**
 * Local codelists first, then each configured URL whose key no local file
 * already provides.
 */
export async function codelistSources(config: ReferenceDataConfig): Promise<string[]> {
  const local = await listCodelistSources(codelistsPath(config));
  const localKeys = new Set(local.map(keyName));
  const remote = config.codelistUrls.filter((url) => {
    const name = keyName(url);
    return name === null || !localKeys.has(name);
  });
  return [...local, ...remote];
}

export async function loadReferenceData(config: ReferenceDataConfig): Promise<ReferenceData> {
  const cache =
    config.cacheDir && config.codelistUrls.length > 0
      ? new CodelistCache(config.cacheDir)
      : undefined;

  const registry = await AttributeDictionaryRegistry.fromSources(await codelistSources(config), {
    concurrency: config.concurrency,
    cache,
    cacheMaxAgeHours: config.cacheMaxAgeHours,
  });
  const specTree = await loadAttributeSpecTree(
    specificationPath(config),
    config.specificationSheet
  );

  return { registry, specTree, resolver: new FrequencyResolver(registry) };
}
