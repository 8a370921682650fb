import { AliasBindings, bindingsFor, buildScopes, isResolvedName, lookupAlias, ScopeTable } from "./alias-resolver";
import { ResolutionContext, resolveTableFor, UnresolvedPolicy } from "./column-resolver";
import { ColumnNode, getColumn, listBlocks, StatementTree } from "./sql-tree";
import { sameIdentifier, splitQualifiedName, stripIdentifierQuotes } from "./text-utils";

export interface BuildOptions {
  /** When false, columns without an explicit qualifier are always dropped. */
  resolveUnqualified: boolean;
  unresolvedPolicy: UnresolvedPolicy;
}

export const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  resolveUnqualified: true,
  unresolvedPolicy: "drop",
};

export interface ReferenceContext extends ResolutionContext {
  options: BuildOptions;
}

// Aliases are usually short: anything longer reads as a table name.
const ALIAS_MAX_LENGTH = 8;
// a, t1, emp, x2 ...
const SHORT_SYMBOL_RE = /^[A-Za-z]{1,3}\d*$/;

export function looksLikeTableName(token: string): boolean {
  if (SHORT_SYMBOL_RE.test(token)) { return false; }
  return token.includes(".") || token.length > ALIAS_MAX_LENGTH || /^[A-Z]/.test(token);
}

/**
 * Join prefix and path, collapsing the longest run of trailing prefix
 * segments that the path already starts with.
 * ["dbo"] + ["dbo", "Orders"] -> ["dbo", "Orders"]
 */
export function mergeSegments(prefix: readonly string[], path: readonly string[]): string[] {
  for (let k = Math.min(prefix.length, path.length); k > 0; k--) {
    const tail = prefix.slice(prefix.length - k);
    if (tail.every((seg, i) => sameIdentifier(seg, path[i]))) {
      return [...prefix.slice(0, prefix.length - k), ...path];
    }
  }
  return [...prefix, ...path];
}

function resolveTablePath(token: string, bindings: AliasBindings, cteNames: ReadonlySet<string>): string[] | null {
  const resolved = lookupAlias(bindings, token);
  if (resolved) {
    return splitQualifiedName(resolved);
  }
  const raw = stripIdentifierQuotes(token);
  if (!raw) { return null; }
  if (isResolvedName(bindings, raw) || cteNames.has(raw.toLowerCase()) || looksLikeTableName(raw)) {
    return splitQualifiedName(raw);
  }
  // most likely an alias that is not bound in this scope
  return null;
}

function qualifierPrefix(column: ColumnNode, bindings: AliasBindings): string[] {
  const prefix: string[] = [];
  for (const part of [column.catalog, column.schema]) {
    if (!part) { continue; }
    const resolved = lookupAlias(bindings, part);
    prefix.push(...splitQualifiedName(resolved ?? part));
  }
  return prefix;
}

/**
 * Render one column occurrence as catalog.schema.table.column (empty parts
 * omitted), or null when the column cannot be attributed to a table or is a
 * wildcard.
 */
export function buildReference(column: ColumnNode, ctx: ReferenceContext): string | null {
  const name = stripIdentifierQuotes(column.name);
  if (!name) { return null; }

  let token = column.table ? stripIdentifierQuotes(column.table) : null;
  if (!token && ctx.options.resolveUnqualified) {
    token = resolveTableFor(name, column.block, ctx);
  }
  if (!token) { return null; }

  const bindings = bindingsFor(ctx.scopes, column.block);
  const path = resolveTablePath(token, bindings, ctx.scopes.cteNames);
  if (!path || path.length === 0) { return null; }

  const segments = [...mergeSegments(qualifierPrefix(column, bindings), path), name];
  const qualified = segments.join(".");
  if (segments.length < 2 || qualified.endsWith(".*")) { return null; }
  return qualified;
}

export function createReferenceContext(tree: StatementTree, options: BuildOptions = DEFAULT_BUILD_OPTIONS, scopes?: ScopeTable): ReferenceContext {
  return {
    tree,
    scopes: scopes ?? buildScopes(tree),
    policy: options.unresolvedPolicy,
    options,
  };
}

/**
 * Every qualified reference in the statement, one per column occurrence,
 * blocks in pre-order and columns in the order they were read.
 */
export function extractStatementReferences(tree: StatementTree, options: BuildOptions = DEFAULT_BUILD_OPTIONS): string[] {
  const ctx = createReferenceContext(tree, options);
  const out: string[] = [];
  for (const block of listBlocks(tree)) {
    for (const id of block.columns) {
      const ref = buildReference(getColumn(tree, id), ctx);
      if (ref) { out.push(ref); }
    }
  }
  return out;
}
