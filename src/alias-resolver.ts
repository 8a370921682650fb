import { listBlocks, NodeId, StatementTree, TableSource } from "./sql-tree";
import { splitQualifiedName, stripIdentifierQuotes } from "./text-utils";

// key (original case and lower case) -> canonical table path or CTE name
export type AliasBindings = ReadonlyMap<string, string>;

export interface ScopeTable {
  /** Lower-cased names of every CTE defined anywhere in the statement. */
  cteNames: ReadonlySet<string>;
  scopes: ReadonlyMap<NodeId, AliasBindings>;
}

const EMPTY_BINDINGS: AliasBindings = new Map();

export function collectCteNames(tree: StatementTree): Set<string> {
  const names = new Set<string>();
  for (const block of listBlocks(tree)) {
    for (const cte of block.ctes) {
      const name = stripIdentifierQuotes(cte.name);
      if (name) { names.add(name.toLowerCase()); }
    }
  }
  return names;
}

/**
 * Canonical identity of a FROM/JOIN table target: the CTE name when the bare
 * table name matches a CTE, however it is qualified, otherwise
 * catalog.schema.table with empty parts dropped. Returns null when the target has no usable name.
 */
export function canonicalTableName(source: TableSource, cteNames: ReadonlySet<string>): string | null {
  const name = stripIdentifierQuotes(source.name);
  if (!name) { return null; }
  const catalog = source.catalog ? stripIdentifierQuotes(source.catalog) : "";
  const schema = source.schema ? stripIdentifierQuotes(source.schema) : "";
  if (cteNames.has(name.toLowerCase())) {
    return name;
  }
  const parts = [catalog, schema, ...splitQualifiedName(name)].filter(Boolean);
  return parts.join(".");
}

export function lookupAlias(bindings: AliasBindings, key: string): string | null {
  const k = stripIdentifierQuotes(key);
  if (!k) { return null; }
  return bindings.get(k) ?? bindings.get(k.toLowerCase()) ?? null;
}

/** True when `token` is already one of the canonical names the bindings resolve to. */
export function isResolvedName(bindings: AliasBindings, token: string): boolean {
  const t = stripIdentifierQuotes(token).toLowerCase();
  for (const value of bindings.values()) {
    if (value.toLowerCase() === t) { return true; }
  }
  return false;
}

function bind(map: Map<string, string>, key: string | null, value: string): void {
  const k = key ? stripIdentifierQuotes(key) : "";
  if (!k) { return; }
  map.set(k, value);
  map.set(k.toLowerCase(), value);
}

/**
 * Build the alias bindings of every query block in the statement. Each block
 * starts from a copy of its parent's bindings and adds its own FROM and JOIN
 * targets; blocks are visited outer to inner so a parent is always complete
 * before its children copy it. Targets without a usable name are skipped.
 */
export function buildScopes(tree: StatementTree): ScopeTable {
  const cteNames = collectCteNames(tree);
  const scopes = new Map<NodeId, AliasBindings>();

  for (const block of listBlocks(tree)) {
    const inherited = block.parent !== null ? scopes.get(block.parent) ?? EMPTY_BINDINGS : EMPTY_BINDINGS;
    const local = new Map(inherited);

    const sources = [...block.from, ...block.joins.map(j => j.source)];
    for (const source of sources) {
      if (source.kind === "table") {
        const canonical = canonicalTableName(source, cteNames);
        if (!canonical) { continue; }
        bind(local, source.alias, canonical);
        bind(local, source.name, canonical);
      } else if (source.alias) {
        const alias = stripIdentifierQuotes(source.alias);
        bind(local, alias, alias);
      }
    }

    scopes.set(block.id, local);
  }

  return { cteNames, scopes };
}

export function bindingsFor(table: ScopeTable, block: NodeId): AliasBindings {
  return table.scopes.get(block) ?? EMPTY_BINDINGS;
}
