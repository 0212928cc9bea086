/**
 * Relabel raw value frequencies with codelist meanings.
 *
 * The stats producer counts string field values verbatim. Coded fields
 * hold codes ("401"), and multi-valued fields hold bracketed lists
 * ("[401, 402]"). A list credits its full count to each member, so
 *
 *   { "[1]": 2, "[1, 2]": 3, "[2, 1]": 4, "[2]": 1 }
 *
 * becomes { "1": 2 + 3 + 4, "2": 3 + 4 + 1 } before relabeling.
 */
import type { CodeDictionary } from './code-dictionary.js';
import type { AttributeDictionaryRegistry } from './attribute-dictionary-registry.js';

// ============================================================================
// Types
// ============================================================================

export type FrequencyTable = Record<string, number>;

export type Label =
  | { kind: 'scalar'; value: string }
  | { kind: 'group'; members: Label[] };

// ============================================================================
// Decoding
// ============================================================================

/**
 * Split a bracket list's interior on commas outside nested brackets.
 * Returns null when brackets don't balance.
 */
function splitTopLevel(interior: string): string[] | null {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < interior.length; i++) {
    const char = interior[i];
    if (char === '[') {
      depth++;
    } else if (char === ']') {
      depth--;
      if (depth < 0) return null;
    } else if (char === ',' && depth === 0) {
      parts.push(interior.slice(start, i));
      start = i + 1;
    }
  }
  if (depth !== 0) return null;

  parts.push(interior.slice(start));
  return parts;
}

/**
 * Decode a raw value into a label. Codes the dictionary doesn't know, and
 * values with unbalanced brackets, pass through as-is (trimmed).
 */
export function decodeLabel(dictionary: CodeDictionary, raw: string): Label {
  const value = raw.trim();

  if (value.length >= 2 && value.startsWith('[') && value.endsWith(']')) {
    const interior = value.slice(1, -1);
    const parts = interior.trim() === '' ? null : splitTopLevel(interior);
    if (parts) {
      return {
        kind: 'group',
        members: parts.map((part) => decodeLabel(dictionary, part)),
      };
    }
    return { kind: 'scalar', value };
  }

  return { kind: 'scalar', value: dictionary.lookup(value) ?? value };
}

/**
 * Every scalar label in a (possibly nested) group, in order.
 */
export function flattenLabel(label: Label): string[] {
  if (label.kind === 'scalar') return [label.value];
  return label.members.flatMap(flattenLabel);
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Credit each raw entry's count to every label it decodes to.
 */
export function relabelFrequencies(
  dictionary: CodeDictionary,
  rawTable: Readonly<FrequencyTable>
): FrequencyTable {
  const totals = new Map<string, number>();

  for (const [raw, count] of Object.entries(rawTable)) {
    for (const label of flattenLabel(decodeLabel(dictionary, raw))) {
      totals.set(label, (totals.get(label) ?? 0) + count);
    }
  }

  return Object.fromEntries(totals);
}

/**
 * Sum several frequency tables label by label.
 */
export function mergeFrequencyTables(tables: Iterable<Readonly<FrequencyTable>>): FrequencyTable {
  const totals = new Map<string, number>();
  for (const table of tables) {
    for (const [label, count] of Object.entries(table)) {
      totals.set(label, (totals.get(label) ?? 0) + count);
    }
  }
  return Object.fromEntries(totals);
}

export class FrequencyResolver {
  constructor(private readonly registry: AttributeDictionaryRegistry) {}

  /**
   * Relabel one layer field's raw frequencies. Without a dictionary for
   * the field the raw table is returned unchanged.
   */
  resolve(
    layerName: string,
    attributeName: string,
    rawTable: Readonly<FrequencyTable>
  ): Readonly<FrequencyTable> {
    const dictionary = this.registry.resolve(layerName, attributeName);
    if (!dictionary) return rawTable;
    return relabelFrequencies(dictionary, rawTable);
  }
}
