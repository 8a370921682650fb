import { ColumnInit, QueryBlockNode, SqlTreeBuilder, TableSource } from "../sql-tree";

export function table(name: string, alias: string | null = null, schema: string | null = null, catalog: string | null = null): TableSource {
  return { kind: "table", catalog, schema, name, alias };
}

export function col(table: string | null, name: string, extra: Omit<ColumnInit, "table" | "name"> = {}): ColumnInit {
  return { table, name, ...extra };
}

/** One SELECT block reading from `sources`, with the given column occurrences. */
export function singleBlock(sources: TableSource[], columns: ColumnInit[]): { builder: SqlTreeBuilder; root: QueryBlockNode } {
  const builder = new SqlTreeBuilder();
  const root = builder.addBlock(null);
  root.from.push(...sources);
  for (const c of columns) { builder.addColumn(root.id, c); }
  return { builder, root };
}
