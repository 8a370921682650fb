import { errorMessage } from "./errors";
import { Logger, logger as defaultLogger } from "./logger";
import { ClauseKind, FromSource, NodeId, QueryBlockNode, SqlTreeBuilder, StatementKind, StatementTree, TableSource } from "./sql-tree";
import { stripIdentifierQuotes } from "./text-utils";

export type AstRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is AstRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Identifier text from the shapes node-sql-parser produces across versions
 * and dialects:
 *  - "Orders" / "[Orders]"
 *  - { type: 'default', value: 'Orders' }
 *  - { expr: { type: 'backticks_quote_string', value: 'Orders' } }
 *  - { name: 'Orders' }
 */
export function identText(raw: unknown): string | null {
  if (typeof raw === "string") {
    const s = stripIdentifierQuotes(raw);
    return s || null;
  }
  if (!isRecord(raw)) { return null; }
  if (typeof raw.value === "string") { return identText(raw.value); }
  if (typeof raw.name === "string") { return identText(raw.name); }
  if (raw.expr !== undefined) { return identText(raw.expr); }
  return null;
}

/**
 * The SELECT node behind a value, whether it is the select itself or a
 * wrapper such as { ast: {...}, parentheses: true } (subqueries, CTE bodies).
 */
export function asSelect(value: unknown): AstRecord | null {
  if (!isRecord(value)) { return null; }
  if (value.type === "select") { return value; }
  if (isRecord(value.ast) && value.ast.type === "select") { return value.ast; }
  return null;
}

/**
 * Table target from a FROM/JOIN item or DML target: { db, schema?, table, as }.
 * With three parts db is the catalog; with two it is the schema.
 */
export function tableSourceOf(item: AstRecord): TableSource | null {
  const name = identText(item.table);
  if (!name) { return null; }
  const db = identText(item.db);
  const schema = identText(item.schema);
  return {
    kind: "table",
    catalog: schema ? db : null,
    schema: schema ?? db,
    name,
    alias: identText(item.as),
  };
}

function isLateral(item: AstRecord, joinType: string | null): boolean {
  return item.lateral === true || /LATERAL|APPLY/i.test(joinType ?? "") || /LATERAL/i.test(String(item.prefix ?? ""));
}

// bookkeeping keys that never hold expressions
const SKIP_KEYS = new Set(["type", "loc", "tableList", "columnList"]);
const SELECT_KEYS = new Set([...SKIP_KEYS, "with", "columns", "from", "where", "groupby", "having", "orderby", "_next", "set_op"]);

class StatementConverter {
  private readonly builder = new SqlTreeBuilder();

  convert(ast: AstRecord): StatementTree {
    const type = typeof ast.type === "string" ? ast.type.toLowerCase() : "";

    if (type === "select") {
      this.visitSelect(ast, null, null, null);
      return this.builder.build("select");
    }

    const root = this.builder.addBlock(null);
    this.visitWith(ast.with, root);

    let kind: StatementKind = "other";
    let handled = new Set([...SKIP_KEYS, "with"]);
    switch (type) {
      case "update":
        kind = "update";
        this.addSources(root, ast.table);
        this.addSources(root, ast.from);
        this.visitAssignments(ast.set, root);
        this.visit(ast.where, root, "where");
        handled = new Set([...handled, "table", "from", "set", "where"]);
        break;
      case "delete": {
        kind = "delete";
        const from = Array.isArray(ast.from) && ast.from.length > 0 ? ast.from : ast.table;
        this.addSources(root, from);
        this.visit(ast.where, root, "where");
        handled = new Set([...handled, "table", "from", "where"]);
        break;
      }
      case "insert":
      case "replace":
        kind = "insert";
        this.addSources(root, ast.table);
        // the target column list names columns, it does not reference them
        handled = new Set([...handled, "table", "columns"]);
        break;
    }
    this.visitRest(ast, root, handled);
    return this.builder.build(kind, root.id);
  }

  private visitSelect(select: AstRecord, parent: NodeId | null, container: NodeId | null, setOperator: string | null): NodeId {
    const block = this.builder.addBlock(parent, container, setOperator);
    this.visitWith(select.with, block);
    this.visit(select.columns, block, "select");
    this.addSources(block, select.from);
    this.visit(select.where, block, "where");
    this.visit(select.groupby, block, "groupBy");
    this.visit(select.having, block, "having");
    this.visit(select.orderby, block, "orderBy");
    this.visitRest(select, block, SELECT_KEYS);

    const next = asSelect(select._next);
    if (next) {
      const op = typeof select.set_op === "string" ? select.set_op.toLowerCase() : "union";
      // set-operation branches are siblings: they share this block's parent
      this.visitSelect(next, block.parent, block.id, op);
    }
    return block.id;
  }

  private visitWith(withList: unknown, block: QueryBlockNode): void {
    const items = Array.isArray(withList) ? withList : isRecord(withList) ? [withList] : [];
    for (const item of items) {
      if (!isRecord(item)) { continue; }
      const name = identText(item.name);
      const body = asSelect(item.stmt);
      if (!name || !body) {
        this.visit(item.stmt, block, "other");
        continue;
      }
      // CTE bodies do not see the bindings of the query that owns the WITH
      const bodyId = this.visitSelect(body, block.parent, block.id, null);
      block.ctes.push({ name, body: bodyId, recursive: item.recursive === true });
    }
  }

  private addSources(block: QueryBlockNode, from: unknown): void {
    const items = Array.isArray(from) ? from : isRecord(from) ? [from] : [];
    for (const item of items) {
      if (!isRecord(item)) { continue; }
      const joinType = typeof item.join === "string" ? item.join.toUpperCase() : null;
      const source = this.fromSource(item, block, joinType);
      if (joinType) {
        const joinIndex = source ? block.joins.length : null;
        if (source) { block.joins.push({ source, joinType }); }
        this.visit(item.on, block, "join", joinIndex);
      } else if (source) {
        block.from.push(source);
      }
    }
  }

  private fromSource(item: AstRecord, block: QueryBlockNode, joinType: string | null): FromSource | null {
    const alias = identText(item.as);
    const lateral = isLateral(item, joinType);
    const sub = asSelect(item.expr);
    if (sub) {
      const body = this.visitSelect(sub, block.id, block.id, null);
      return { kind: "derived", alias, body, lateral };
    }
    const table = tableSourceOf(item);
    if (table) { return table; }
    // table-valued functions, VALUES lists and the like
    this.visit(item.expr, block, "other");
    return alias ? { kind: "derived", alias, body: null, lateral } : null;
  }

  private visitAssignments(set: unknown, block: QueryBlockNode): void {
    if (!Array.isArray(set)) { return; }
    for (const assignment of set) {
      if (!isRecord(assignment)) { continue; }
      const name = identText(assignment.column);
      if (name) {
        this.builder.addColumn(block.id, { table: identText(assignment.table), name, clause: "set" });
      }
      this.visit(assignment.value, block, "set");
    }
  }

  private visitRest(node: AstRecord, block: QueryBlockNode, handled: ReadonlySet<string>): void {
    for (const [key, child] of Object.entries(node)) {
      if (handled.has(key)) { continue; }
      this.visit(child, block, "other");
    }
  }

  private visit(value: unknown, block: QueryBlockNode, clause: ClauseKind, joinIndex: number | null = null): void {
    if (Array.isArray(value)) {
      for (const v of value) { this.visit(v, block, clause, joinIndex); }
      return;
    }
    if (!isRecord(value)) { return; }

    const sub = asSelect(value);
    if (sub) {
      this.visitSelect(sub, block.id, block.id, null);
      return;
    }

    if (value.type === "column_ref") {
      this.addColumnRef(value, block, clause, joinIndex);
      return;
    }

    for (const [key, child] of Object.entries(value)) {
      if (SKIP_KEYS.has(key)) { continue; }
      this.visit(child, block, clause, joinIndex);
    }
  }

  private addColumnRef(ref: AstRecord, block: QueryBlockNode, clause: ClauseKind, joinIndex: number | null): void {
    const name = identText(ref.column);
    if (!name) { return; }
    const db = identText(ref.db);
    const schema = identText(ref.schema);
    this.builder.addColumn(block.id, {
      catalog: schema ? db : null,
      schema: schema ?? db,
      table: identText(ref.table),
      name,
      clause,
      joinIndex,
    });
  }
}

/**
 * Convert node-sql-parser output (one AST or a list of them) into arena
 * statement trees. Entries that are not statements, or that fail to convert,
 * come back as null so their siblings are kept.
 */
export function toStatementTrees(ast: unknown, log: Logger = defaultLogger): Array<StatementTree | null> {
  const list: unknown[] = Array.isArray(ast) ? ast : [ast];
  return list.map((stmt, i) => {
    if (!isRecord(stmt)) { return null; }
    try {
      return new StatementConverter().convert(stmt);
    } catch (err) {
      log.warn(`Statement #${i + 1} could not be converted: ${errorMessage(err)}`);
      return null;
    }
  });
}
