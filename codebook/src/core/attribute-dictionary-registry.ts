/**
 * Registry of codelist dictionaries keyed by (feature, attribute).
 *
 * PLATEAU datasets publish one codelist per coded attribute, named
 * `{Feature}_{Attribute}.xml` (e.g. `Building_usage.xml`,
 * `LandSlideRiskAttribute_areaType.xml`). Attribute names reported by the
 * stats producer don't always line up with those file names, so `resolve`
 * walks a chain of fallbacks.
 */
import { readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { CodeDictionary, loadCodeDictionary, type LoadDictionaryOptions } from './code-dictionary.js';
import { errorMessage, isMissingPath, ReferenceDataMissingError } from './errors.js';
import { isRemoteSource, loadAll, type LoadProgress } from './fetcher.js';

// ============================================================================
// Types
// ============================================================================

export interface AttributeKey {
  feature: string;
  attribute: string;
}

export interface RegistryBuildOptions extends LoadDictionaryOptions {
  concurrency?: number;
  onProgress?: (progress: LoadProgress) => void;
}

/** Attributes whose values are municipality codes, whatever the feature */
export const ADMINISTRATIVE_ATTRIBUTES: ReadonlySet<string> = new Set(['prefecture', 'city']);
export const ADMINISTRATIVE_KEY: AttributeKey = {
  feature: 'Common',
  attribute: 'localPublicAuthorities',
};

export const CODELIST_EXTENSION = '.xml';
export const COMPOSITE_SEPARATOR = '|';

/**
 * Split a codelist file name into its (feature, attribute) key.
 * The stem is everything before the first `.`; tokens after the second
 * `_`-delimited one are ignored.
 */
export function parseCodelistFileName(fileName: string): AttributeKey | null {
  const stem = fileName.split('.')[0];
  const [feature, attribute] = stem.split('_');
  if (!feature || !attribute) return null;
  return { feature, attribute };
}

function keyOf(feature: string, attribute: string): string {
  return `${feature}\u0000${attribute}`;
}

// ============================================================================
// Registry
// ============================================================================

export class AttributeDictionaryRegistry {
  private readonly byKey = new Map<string, CodeDictionary>();
  private readonly byAttribute = new Map<string, CodeDictionary[]>();
  private readonly registered: AttributeKey[] = [];

  static empty(): AttributeDictionaryRegistry {
    return new AttributeDictionaryRegistry();
  }

  /**
   * Build a registry from (key, dictionary) pairs, registered in order.
   */
  static fromEntries(
    entries: Iterable<readonly [AttributeKey, CodeDictionary]>
  ): AttributeDictionaryRegistry {
    const registry = new AttributeDictionaryRegistry();
    for (const [key, dictionary] of entries) {
      registry.register(key, dictionary);
    }
    return registry;
  }

  /**
   * Build a registry from codelist paths or URLs, registered in the given
   * order. The key comes from each source's file name. Sources that fail
   * to load are logged and left unregistered.
   */
  static async fromSources(
    sources: string[],
    options: RegistryBuildOptions = {}
  ): Promise<AttributeDictionaryRegistry> {
    const registry = new AttributeDictionaryRegistry();

    const candidates: Array<{ source: string; key: AttributeKey }> = [];
    for (const source of sources) {
      const key = codelistKey(source);
      if (!key) {
        console.warn(`  Skipping ${source}: name is not {Feature}_{Attribute}`);
        continue;
      }
      candidates.push({ source, key });
    }

    console.log(`Loading ${candidates.length} codelists...`);

    const { concurrency, onProgress, ...loadOptions } = options;
    const results = await loadAll(
      candidates.map((c) => c.source),
      (source) => loadCodeDictionary(source, loadOptions),
      { concurrency, onProgress }
    );

    // Register in source order regardless of load completion order
    results.forEach((result, i) => {
      if (result.ok) {
        registry.register(candidates[i].key, result.value);
      } else {
        console.warn(`  Skipping ${result.source}: ${errorMessage(result.error)}`);
      }
    });

    console.log(`  Registered ${registry.size} codelists`);
    return registry;
  }

  /**
   * Build a registry from every `{Feature}_{Attribute}.xml` directly under
   * `dir`, in file-name order. A missing directory yields an empty registry.
   */
  static async fromDirectory(
    dir: string,
    options: RegistryBuildOptions = {}
  ): Promise<AttributeDictionaryRegistry> {
    return AttributeDictionaryRegistry.fromSources(await listCodelistSources(dir), options);
  }

  /**
   * Register a dictionary. An existing exact key is replaced; the
   * attribute-only index keeps its first entry.
   */
  register(key: AttributeKey, dictionary: CodeDictionary): void {
    const exact = keyOf(key.feature, key.attribute);
    if (!this.byKey.has(exact)) {
      this.registered.push({ ...key });
    }
    this.byKey.set(exact, dictionary);

    const sameAttribute = this.byAttribute.get(key.attribute);
    if (sameAttribute) {
      sameAttribute.push(dictionary);
    } else {
      this.byAttribute.set(key.attribute, [dictionary]);
    }
  }

  get size(): number {
    return this.byKey.size;
  }

  keys(): AttributeKey[] {
    return this.registered.map((key) => ({ ...key }));
  }

  get(feature: string, attribute: string): CodeDictionary | undefined {
    return this.byKey.get(keyOf(feature, attribute));
  }

  /**
   * The dictionary for a (feature, attribute) pair, or undefined.
   *
   * 1. exact key
   * 2. prefecture/city → Common_localPublicAuthorities
   * 3. composite path `...|Element|attribute`: (Element, attribute), then
   *    (Element without a leading feature name, attribute)
   * 4. first dictionary registered for the attribute under any feature
   */
  resolve(feature: string, attribute: string): CodeDictionary | undefined {
    const exact = this.get(feature, attribute);
    if (exact) return exact;

    if (ADMINISTRATIVE_ATTRIBUTES.has(attribute)) {
      const municipal = this.get(ADMINISTRATIVE_KEY.feature, ADMINISTRATIVE_KEY.attribute);
      if (municipal) return municipal;
    }

    const composite = this.resolveComposite(feature, attribute);
    if (composite) return composite;

    return this.byAttribute.get(attribute)?.[0];
  }

  /**
   * `buildingDisasterRiskAttribute|BuildingLandSlideRiskAttribute|description`
   * names the `description` of a BuildingLandSlideRiskAttribute element. Its
   * codelist is LandSlideRiskAttribute_description, so a leading feature name
   * is stripped from the element name when the element itself has none.
   */
  private resolveComposite(feature: string, attribute: string): CodeDictionary | undefined {
    const segments = attribute.split(COMPOSITE_SEPARATOR);
    if (segments.length < 2) return undefined;

    const element = segments[segments.length - 2];
    const leaf = segments[segments.length - 1];

    const direct = this.get(element, leaf);
    if (direct) return direct;

    if (element.startsWith(feature)) {
      return this.get(element.slice(feature.length), leaf);
    }
    return undefined;
  }
}

/**
 * The (feature, attribute) key of a codelist path or URL, from its file name.
 */
export function codelistKey(source: string): AttributeKey | null {
  if (isRemoteSource(source) && !URL.canParse(source)) return null;
  const fileName = isRemoteSource(source)
    ? basename(new URL(source).pathname)
    : basename(source);
  return parseCodelistFileName(fileName);
}

/**
 * Codelist paths directly under `dir`, sorted by file name.
 * A missing directory is logged and yields no paths.
 */
export async function listCodelistSources(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && extname(e.name).toLowerCase() === CODELIST_EXTENSION)
      .map((e) => e.name)
      .sort()
      .map((name) => join(dir, name));
  } catch (error) {
    if (isMissingPath(error)) {
      const missing = new ReferenceDataMissingError(dir, 'Codelist directory not found');
      console.warn(`${missing.message}. No codelists registered.`);
      return [];
    }
    throw error;
  }
}
