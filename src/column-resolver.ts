import { bindingsFor, canonicalTableName, lookupAlias, ScopeTable } from "./alias-resolver";
import { ClauseKind, ColumnNode, getBlock, getColumn, NodeId, QueryBlockNode, StatementTree } from "./sql-tree";
import { sameIdentifier } from "./text-utils";

/**
 * What to do with an unqualified column when its block reads from several
 * tables and no predicate names the column with a qualifier.
 * - "drop": leave it unresolved
 * - "first-table": attribute it to the first FROM-clause table
 */
export type UnresolvedPolicy = "drop" | "first-table";

export interface ResolutionContext {
  tree: StatementTree;
  scopes: ScopeTable;
  policy: UnresolvedPolicy;
}

/** Canonical names of the physical tables and CTEs a block reads from, FROM first then JOINs. */
export function scopeTables(block: QueryBlockNode, cteNames: ReadonlySet<string>): string[] {
  const out: string[] = [];
  for (const source of [...block.from, ...block.joins.map(j => j.source)]) {
    if (source.kind !== "table") { continue; }
    const name = canonicalTableName(source, cteNames);
    if (name) { out.push(name); }
  }
  return out;
}

function qualifierOf(column: ColumnNode): string | null {
  if (!column.table) { return null; }
  return [column.catalog, column.schema, column.table].filter(Boolean).join(".");
}

function findQualifiedSibling(
  ctx: ResolutionContext,
  block: QueryBlockNode,
  columnName: string,
  matches: (c: ColumnNode) => boolean,
): string | null {
  const bindings = bindingsFor(ctx.scopes, block.id);
  for (const id of block.columns) {
    const candidate = getColumn(ctx.tree, id);
    if (!matches(candidate) || !candidate.table) { continue; }
    if (!sameIdentifier(candidate.name, columnName)) { continue; }
    return lookupAlias(bindings, candidate.table) ?? qualifierOf(candidate);
  }
  return null;
}

const PREDICATE_CLAUSES: ReadonlySet<ClauseKind> = new Set<ClauseKind>(["where", "having"]);

/**
 * Infer the table an unqualified column belongs to. Only adopts a table when
 * the block has a single one, or when a join / filter predicate in the same
 * block names the column with an explicit qualifier.
 */
export function resolveTableFor(columnName: string, blockId: NodeId, ctx: ResolutionContext): string | null {
  const block = getBlock(ctx.tree, blockId);
  const tables = scopeTables(block, ctx.scopes.cteNames);

  if (tables.length === 1) {
    return tables[0];
  }

  for (let joinIndex = 0; joinIndex < block.joins.length; joinIndex++) {
    const found = findQualifiedSibling(ctx, block, columnName, c => c.clause === "join" && c.joinIndex === joinIndex);
    if (found) { return found; }
  }

  const fromPredicate = findQualifiedSibling(ctx, block, columnName, c => PREDICATE_CLAUSES.has(c.clause));
  if (fromPredicate) { return fromPredicate; }

  if (ctx.policy === "first-table" && tables.length > 0) {
    return tables[0];
  }
  return null;
}
