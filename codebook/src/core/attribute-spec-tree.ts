/**
 * Attribute specification tree.
 *
 * The CityGML product specification lists every feature and its nested
 * attributes/roles in one flat table. Nesting is encoded by which name
 * column a row populates:
 *
 *   prefix | feature  | role1       | role2 | ... | description
 *   bldg   | Building |             |       |     | 建築物
 *   bldg   |          | bldg:class  |       |     | 建築物の形態による区分
 *   uro    |          | uro:bldgDisasterRiskAttribute | | | ...
 *   uro    |          |             | uro:description | | 浸水ランク
 *
 * Nodes live in an arena and refer to each other by index.
 */
import { SpecTableError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export const SPEC_COLUMN_COUNT = 14;
export const MAX_DEPTH = 4;

/** Name columns by depth: featureName, role1..role4 */
const NAME_COLUMNS = [1, 2, 3, 4, 5] as const;

export type SpecRow = readonly string[];

export type NodeId = number;

export interface AttributeSpecNode {
  id: NodeId;
  depth: number;
  /** Index of the source row, or null for a node implied by a shallower name on a deeper row */
  row: number | null;
  modelPrefix: string;
  nameAtDepth: string;
  category: string;
  description: string;
  creationTarget: string;
  additionalTarget: string;
  codeExtension: string;
  remarks: string;
  mandatoryFlag: string;
  dataSource: string;
  parent: NodeId | null;
  root: NodeId;
  children: NodeId[];
}

// ============================================================================
// Row Helpers
// ============================================================================

/**
 * Strip a `prefix:` namespace qualifier.
 */
export function localName(name: string): string {
  const idx = name.lastIndexOf(':');
  return idx === -1 ? name : name.slice(idx + 1);
}

/**
 * Right-pad a row to the full column count and trim every cell.
 */
export function normalizeRow(row: readonly unknown[]): string[] {
  const cells: string[] = [];
  for (let i = 0; i < Math.max(row.length, SPEC_COLUMN_COUNT); i++) {
    const value = row[i];
    cells.push(value === null || value === undefined ? '' : String(value).trim());
  }
  return cells;
}

/**
 * Deepest populated name depth of a row, or null if no name column is set.
 */
export function deepestDepth(row: SpecRow): number | null {
  for (let depth = MAX_DEPTH; depth >= 0; depth--) {
    if (row[NAME_COLUMNS[depth]]) return depth;
  }
  return null;
}

/**
 * The name a row is keyed by: its deepest populated name column.
 */
export function deepestName(row: SpecRow): string | null {
  const depth = deepestDepth(row);
  return depth === null ? null : row[NAME_COLUMNS[depth]];
}

function nameAt(row: SpecRow, depth: number): string {
  return row[NAME_COLUMNS[depth]] ?? '';
}

function keyOf(rootName: string, name: string): string {
  return `${localName(rootName)}\u0000${localName(name)}`;
}

// ============================================================================
// Tree
// ============================================================================

export class AttributeSpecTree {
  readonly source: string;
  private readonly nodes: AttributeSpecNode[] = [];
  private readonly rootIds: NodeId[] = [];
  private readonly index = new Map<string, NodeId>();

  private constructor(source: string) {
    this.source = source;
  }

  static empty(source = '<empty>'): AttributeSpecTree {
    return new AttributeSpecTree(source);
  }

  /**
   * Build the forest from data rows (header rows already removed).
   *
   * Every populated name column at depth d attaches to the most recent
   * node at depth d-1, even when a shallower node has been seen since.
   * A name with no node ever seen one level up fails.
   */
  static fromRows(rows: readonly (readonly unknown[])[], source = '<rows>'): AttributeSpecTree {
    const tree = new AttributeSpecTree(source);
    const current: (NodeId | null)[] = [null, null, null, null, null];

    rows.forEach((raw, rowIndex) => {
      const row = normalizeRow(raw);
      const leafDepth = deepestDepth(row);
      if (leafDepth === null) return;

      for (let depth = 0; depth <= leafDepth; depth++) {
        const name = nameAt(row, depth);
        if (!name) continue;

        const parent = depth === 0 ? null : current[depth - 1];
        if (depth > 0 && parent === null) {
          throw new SpecTableError(
            source,
            `"${name}" at depth ${depth} has no enclosing node at depth ${depth - 1}`,
            rowIndex
          );
        }

        current[depth] = tree.addNode(row, depth, name, parent, depth === leafDepth ? rowIndex : null);
      }
    });

    return tree;
  }

  private addNode(
    row: SpecRow,
    depth: number,
    name: string,
    parent: NodeId | null,
    rowIndex: number | null
  ): NodeId {
    const id = this.nodes.length;
    const documented = rowIndex !== null;
    const root = parent === null ? id : this.nodes[parent].root;

    const node: AttributeSpecNode = {
      id,
      depth,
      row: rowIndex,
      modelPrefix: row[0],
      nameAtDepth: name,
      category: documented ? row[6] : '',
      description: documented ? row[7] : '',
      creationTarget: documented ? row[8] : '',
      additionalTarget: documented ? row[9] : '',
      codeExtension: documented ? row[10] : '',
      remarks: documented ? row[11] : '',
      mandatoryFlag: documented ? row[12] : '',
      dataSource: documented ? row[13] : '',
      parent,
      root,
      children: [],
    };
    this.nodes.push(node);

    if (parent === null) {
      this.rootIds.push(id);
    } else {
      this.nodes[parent].children.push(id);
    }

    // Later rows with the same key replace earlier ones
    const key = keyOf(this.nodes[root].nameAtDepth, name);
    if (documented || !this.index.has(key)) {
      this.index.set(key, id);
    }
    return id;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  get size(): number {
    return this.nodes.length;
  }

  node(id: NodeId): AttributeSpecNode {
    const node = this.nodes[id];
    if (!node) {
      throw new RangeError(`No spec node with id ${id}`);
    }
    return node;
  }

  roots(): AttributeSpecNode[] {
    return this.rootIds.map((id) => this.nodes[id]);
  }

  children(id: NodeId): AttributeSpecNode[] {
    return this.node(id).children.map((child) => this.nodes[child]);
  }

  lookup(rootFeature: string, attribute: string): AttributeSpecNode | undefined {
    const id = this.index.get(keyOf(rootFeature, attribute));
    return id === undefined ? undefined : this.nodes[id];
  }

  describe(rootFeature: string, attribute: string): string | undefined {
    return this.lookup(rootFeature, attribute)?.description;
  }

  /**
   * Names from the root down to the node, joined with `-`.
   */
  fullPath(id: NodeId): string {
    const names: string[] = [];
    let cursor: NodeId | null = id;
    while (cursor !== null) {
      const node = this.node(cursor);
      names.unshift(node.nameAtDepth);
      cursor = node.parent;
    }
    return names.join('-');
  }

  /**
   * Every node of the trees rooted at features with this local name, in row order.
   */
  nodesOf(rootFeature: string): AttributeSpecNode[] {
    const wanted = localName(rootFeature);
    return this.nodes.filter(
      (node) => localName(this.nodes[node.root].nameAtDepth) === wanted
    );
  }
}
