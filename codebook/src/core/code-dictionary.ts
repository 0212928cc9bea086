/**
 * CityGML codelist dictionaries.
 *
 * A codelist is a GML Dictionary document:
 *
 *   <gml:Dictionary>
 *     <gml:dictionaryEntry>
 *       <gml:Definition gml:id="id1">
 *         <gml:description>住宅</gml:description>
 *         <gml:name>401</gml:name>
 *       </gml:Definition>
 *     </gml:dictionaryEntry>
 *     ...
 *
 * Each Definition maps a code (name) to its meaning (description).
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { isStale, type CodelistCache } from './cache.js';
import {
  DEFAULT_RETRY,
  fetchTextWithRetry,
  isRemoteSource,
  readSourceText,
  type RetryOptions,
} from './fetcher.js';
import { DictionaryLoadError, errorMessage } from './errors.js';

export interface LoadDictionaryOptions {
  /** Cache for remote sources; local files are always read from disk */
  cache?: CodelistCache;
  cacheMaxAgeHours?: number;
  retry?: Partial<RetryOptions>;
}

export class CodeDictionary {
  readonly source: string;
  private readonly entries: ReadonlyMap<string, string>;

  constructor(source: string, entries: Iterable<readonly [string, string]>) {
    this.source = source;
    this.entries = new Map(entries);
  }

  lookup(code: string): string | undefined {
    return this.entries.get(code);
  }

  codes(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  static async load(
    source: string,
    options: LoadDictionaryOptions = {}
  ): Promise<CodeDictionary> {
    return loadCodeDictionary(source, options);
  }
}

// ============================================================================
// XML Parsing
// ============================================================================

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  // Numeric character references (&#20303; / &#x4F4F;)
  htmlEntities: true,
  isArray: (name) => name === 'dictionaryEntry' || name === 'Definition',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * First text value of an element. Repeated elements yield the first one,
 * as XPath findtext does.
 */
function textOf(value: unknown): string | null {
  const first = asArray(value)[0];
  if (typeof first === 'string') return first;
  if (typeof first === 'number') return String(first);
  return null;
}

/**
 * Extract (code, meaning) pairs from a codelist document.
 * Definitions missing a name or description are skipped.
 */
export function parseCodelistXml(xml: string, source = '<inline>'): Array<[string, string]> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new DictionaryLoadError(source, `${msg} (line ${line})`);
  }

  const doc: unknown = parser.parse(xml);
  if (!isRecord(doc)) {
    throw new DictionaryLoadError(source, 'document has no root element');
  }

  const rootName = Object.keys(doc).find((key) => !key.startsWith('?'));
  const root = rootName === undefined ? undefined : doc[rootName];
  if (!isRecord(root)) {
    throw new DictionaryLoadError(source, 'document has no root element');
  }

  const pairs: Array<[string, string]> = [];
  for (const entry of asArray(root.dictionaryEntry)) {
    if (!isRecord(entry)) continue;
    for (const definition of asArray(entry.Definition)) {
      if (!isRecord(definition)) continue;
      const code = textOf(definition.name);
      const meaning = textOf(definition.description);
      if (code && meaning) {
        pairs.push([code, meaning]);
      }
    }
  }
  return pairs;
}

// ============================================================================
// Loading
// ============================================================================

async function readCodelistText(
  source: string,
  options: LoadDictionaryOptions
): Promise<string> {
  const { cache, cacheMaxAgeHours = 24 } = options;
  const retry = { ...DEFAULT_RETRY, ...options.retry };

  if (!cache || !isRemoteSource(source)) {
    return (await readSourceText(source, retry)).body;
  }

  const cached = await cache.get(source);
  if (cached && !isStale(cached, cacheMaxAgeHours)) {
    return cached.body;
  }

  const fetched = await fetchTextWithRetry(source, retry, cached?.etag ?? null);
  if (fetched.notModified && cached) {
    await cache.put(source, cached.body, cached.etag);
    return cached.body;
  }
  await cache.put(source, fetched.body, fetched.etag);
  return fetched.body;
}

export async function loadCodeDictionary(
  source: string,
  options: LoadDictionaryOptions = {}
): Promise<CodeDictionary> {
  let xml: string;
  try {
    xml = await readCodelistText(source, options);
  } catch (error) {
    throw new DictionaryLoadError(source, errorMessage(error), { cause: error });
  }
  return new CodeDictionary(source, parseCodelistXml(xml, source));
}
