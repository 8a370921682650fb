import { StatementProcessingError } from "./errors";

// Arena-indexed statement tree. Nodes reference each other by index into `nodes`;
// ids are handed out in pre-order while the tree is built, so a block's id is
// always smaller than the ids of the blocks nested inside it.

export type NodeId = number;

export type StatementKind = "select" | "insert" | "update" | "delete" | "other";

export type ClauseKind = "select" | "join" | "where" | "having" | "groupBy" | "orderBy" | "set" | "other";

export interface TableSource {
  kind: "table";
  catalog: string | null;
  schema: string | null;
  name: string;
  alias: string | null;
}

export interface DerivedSource {
  kind: "derived";
  alias: string | null;
  body: NodeId | null;
  lateral: boolean;
}

export type FromSource = TableSource | DerivedSource;

export interface JoinTarget {
  source: FromSource;
  joinType: string;
}

export interface CteDefinition {
  name: string;
  body: NodeId;
  recursive: boolean;
}

export interface QueryBlockNode {
  kind: "query";
  id: NodeId;
  /** Scope whose alias bindings this block inherits. */
  parent: NodeId | null;
  /** Operator linking this block to the previous branch of a set operation. */
  setOperator: string | null;
  from: FromSource[];
  joins: JoinTarget[];
  ctes: CteDefinition[];
  columns: NodeId[];
  /** Blocks syntactically nested in this one, in visit order. */
  children: NodeId[];
}

export interface ColumnNode {
  kind: "column";
  id: NodeId;
  block: NodeId;
  catalog: string | null;
  schema: string | null;
  table: string | null;
  name: string;
  clause: ClauseKind;
  /** Index into the owning block's `joins` when `clause` is "join". */
  joinIndex: number | null;
}

export type SqlNode = QueryBlockNode | ColumnNode;

export interface StatementTree {
  kind: StatementKind;
  root: NodeId;
  nodes: readonly SqlNode[];
}

export interface ColumnInit {
  catalog?: string | null;
  schema?: string | null;
  table?: string | null;
  name: string;
  clause?: ClauseKind;
  joinIndex?: number | null;
}

export class SqlTreeBuilder {
  private readonly nodes: SqlNode[] = [];

  /**
   * Adds a query block. `parent` is the inheritance parent; `container` is the
   * block the new one is syntactically nested in (they differ for set-operation
   * branches and CTE bodies).
   */
  addBlock(parent: NodeId | null, container: NodeId | null = parent, setOperator: string | null = null): QueryBlockNode {
    const block: QueryBlockNode = {
      kind: "query",
      id: this.nodes.length,
      parent,
      setOperator,
      from: [],
      joins: [],
      ctes: [],
      columns: [],
      children: [],
    };
    this.nodes.push(block);
    if (container !== null) {
      this.block(container).children.push(block.id);
    }
    return block;
  }

  addColumn(block: NodeId, init: ColumnInit): ColumnNode {
    const column: ColumnNode = {
      kind: "column",
      id: this.nodes.length,
      block,
      catalog: init.catalog ?? null,
      schema: init.schema ?? null,
      table: init.table ?? null,
      name: init.name,
      clause: init.clause ?? "select",
      joinIndex: init.joinIndex ?? null,
    };
    this.nodes.push(column);
    this.block(block).columns.push(column.id);
    return column;
  }

  block(id: NodeId): QueryBlockNode {
    const node = this.nodes[id];
    if (!node || node.kind !== "query") {
      throw new StatementProcessingError(`Node ${id} is not a query block`);
    }
    return node;
  }

  build(kind: StatementKind, root: NodeId = 0): StatementTree {
    this.block(root);
    return { kind, root, nodes: this.nodes.slice() };
  }
}

export function getBlock(tree: StatementTree, id: NodeId): QueryBlockNode {
  const node = tree.nodes[id];
  if (!node || node.kind !== "query") {
    throw new StatementProcessingError(`Node ${id} is not a query block`);
  }
  return node;
}

export function getColumn(tree: StatementTree, id: NodeId): ColumnNode {
  const node = tree.nodes[id];
  if (!node || node.kind !== "column") {
    throw new StatementProcessingError(`Node ${id} is not a column`);
  }
  return node;
}

/**
 * Pre-order walk over the query blocks reachable from the root, using an
 * explicit stack. Ids that do not name a block are skipped.
 */
export function listBlocks(tree: StatementTree): QueryBlockNode[] {
  const out: QueryBlockNode[] = [];
  const seen = new Set<NodeId>();
  const stack: NodeId[] = [tree.root];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) { continue; }
    seen.add(id);
    const node = tree.nodes[id];
    if (!node || node.kind !== "query") { continue; }
    out.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return out;
}
