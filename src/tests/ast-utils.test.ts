import { describe, expect, it } from "vitest";
import { createLogger, memorySink } from "../logger";
import { asSelect, identText, toStatementTrees } from "../ast-utils";
import { extractStatementReferences } from "../reference-builder";
import { getBlock, getColumn, listBlocks, StatementTree } from "../sql-tree";

const ref = (table: string | null, column: unknown) => ({ type: "column_ref", table, column });

function only(trees: Array<StatementTree | null>): StatementTree {
  expect(trees).toHaveLength(1);
  const [tree] = trees;
  if (!tree) { throw new Error("expected a statement tree"); }
  return tree;
}

describe("identText", () => {
  it("reads the identifier shapes the parser emits", () => {
    expect(identText("[Orders]")).toBe("Orders");
    expect(identText({ type: "default", value: "cte1" })).toBe("cte1");
    expect(identText({ expr: { type: "backticks_quote_string", value: "total" } })).toBe("total");
    expect(identText({ name: '"Items"' })).toBe("Items");
    expect(identText(null)).toBeNull();
    expect(identText("")).toBeNull();
    expect(identText(42)).toBeNull();
  });
});

describe("asSelect", () => {
  it("unwraps subquery wrappers", () => {
    const select = { type: "select", columns: [] };
    expect(asSelect(select)).toBe(select);
    expect(asSelect({ ast: select, parentheses: true })).toBe(select);
    expect(asSelect({ type: "insert" })).toBeNull();
  });
});

describe("toStatementTrees", () => {
  it("records sources, joins and the clause of every column", () => {
    const tree = only(toStatementTrees({
      type: "select",
      with: null,
      columns: [{ expr: ref("a", "x"), as: null }],
      from: [
        { db: "dbo", table: "Foo", as: "a" },
        {
          db: null,
          table: "Bar",
          as: "b",
          join: "INNER JOIN",
          on: { type: "binary_expr", operator: "=", left: ref("a", "id"), right: ref("b", "id") },
        },
      ],
      where: { type: "binary_expr", operator: ">", left: ref(null, { expr: { type: "default", value: "total" } }), right: { type: "number", value: 5 } },
      orderby: [{ expr: ref("b", "rank"), type: "ASC" }],
    }));

    const root = getBlock(tree, tree.root);
    expect(tree.kind).toBe("select");
    expect(root.from).toEqual([{ kind: "table", catalog: null, schema: "dbo", name: "Foo", alias: "a" }]);
    expect(root.joins).toEqual([{ source: { kind: "table", catalog: null, schema: null, name: "Bar", alias: "b" }, joinType: "INNER JOIN" }]);
    expect(root.columns.map(id => {
      const c = getColumn(tree, id);
      return [c.table, c.name, c.clause, c.joinIndex];
    })).toEqual([
      ["a", "x", "select", null],
      ["a", "id", "join", 0],
      ["b", "id", "join", 0],
      [null, "total", "where", null],
      ["b", "rank", "orderBy", null],
    ]);
  });

  it("reads three-part table names", () => {
    const tree = only(toStatementTrees({ type: "select", columns: [], from: [{ db: "Warehouse", schema: "dbo", table: "Orders", as: null }] }));
    expect(getBlock(tree, tree.root).from).toEqual([{ kind: "table", catalog: "Warehouse", schema: "dbo", name: "Orders", alias: null }]);
  });

  it("makes CTE bodies and union branches siblings of the owning block", () => {
    const tree = only(toStatementTrees({
      type: "select",
      with: [{
        name: { type: "default", value: "cte1" },
        stmt: { ast: { type: "select", columns: [{ expr: ref(null, "x") }], from: [{ db: null, table: "Src", as: null }] } },
      }],
      columns: [{ expr: ref("cte1", "x") }],
      from: [{ db: null, table: "cte1", as: null }],
      set_op: "union",
      _next: { type: "select", columns: [{ expr: ref("b", "y") }], from: [{ db: null, table: "Bar", as: "b" }] },
    }));

    const blocks = listBlocks(tree);
    expect(blocks.map(b => [b.id, b.parent, b.setOperator])).toEqual([
      [0, null, null],
      [1, null, null],
      [4, null, "union"],
    ]);
    expect(getBlock(tree, 0).ctes).toEqual([{ name: "cte1", body: 1, recursive: false }]);
    expect(extractStatementReferences(tree)).toEqual(["cte1.x", "Src.x", "Bar.y"]);
  });

  it("nests subqueries found in expressions and derived tables", () => {
    const tree = only(toStatementTrees({
      type: "select",
      columns: [{ expr: ref("t", "x") }],
      from: [{ expr: { ast: { type: "select", columns: [{ expr: ref("a", "x") }], from: [{ db: null, table: "Foo", as: "a" }] } }, as: "t" }],
      where: {
        type: "binary_expr",
        operator: "IN",
        left: ref("t", "x"),
        right: {
          type: "expr_list",
          value: [{ ast: { type: "select", columns: [{ expr: ref("c", "x") }], from: [{ db: null, table: "Customers", as: "c" }] }, parentheses: true }],
        },
      },
    }));

    const root = getBlock(tree, tree.root);
    expect(root.from).toEqual([{ kind: "derived", alias: "t", body: 2, lateral: false }]);
    expect(listBlocks(tree).map(b => b.parent)).toEqual([null, 0, 0]);
    expect(extractStatementReferences(tree)).toEqual(["t.x", "t.x", "Foo.x", "Customers.x"]);
  });

  it("binds the target of an UPDATE and reads SET assignments", () => {
    const tree = only(toStatementTrees({
      type: "update",
      table: [{ db: null, table: "Orders", as: "o" }],
      set: [{ column: "status", value: ref("o", "next_status"), table: null }],
      where: { type: "binary_expr", operator: "=", left: ref("o", "id"), right: { type: "number", value: 1 } },
    }));
    expect(tree.kind).toBe("update");
    expect(extractStatementReferences(tree)).toEqual(["Orders.status", "Orders.next_status", "Orders.id"]);
  });

  it("reads DELETE and INSERT ... SELECT", () => {
    const del = only(toStatementTrees({
      type: "delete",
      table: [{ db: null, table: "Logs", as: null }],
      from: [{ db: null, table: "Logs", as: null }],
      where: { type: "binary_expr", operator: "<", left: ref(null, "created"), right: { type: "number", value: 0 } },
    }));
    expect(del.kind).toBe("delete");
    expect(extractStatementReferences(del)).toEqual(["Logs.created"]);

    const ins = only(toStatementTrees({
      type: "insert",
      table: [{ db: null, table: "Archive", as: null }],
      columns: ["a", "b"],
      values: { type: "select", columns: [{ expr: ref("s", "a") }], from: [{ db: null, table: "Staging", as: "s" }] },
    }));
    expect(ins.kind).toBe("insert");
    expect(extractStatementReferences(ins)).toEqual(["Staging.a"]);
  });

  it("maps entries that are not statements to null", () => {
    const trees = toStatementTrees([null, { type: "select", columns: [], from: [] }]);
    expect(trees[0]).toBeNull();
    expect(trees[1]?.kind).toBe("select");
  });

  it("keeps sibling statements when one fails to convert", () => {
    const sink = memorySink();
    const failing = {
      type: "select",
      get columns(): unknown { throw new Error("unreadable column list"); },
    };
    const trees = toStatementTrees([failing, { type: "select", columns: [{ expr: ref("a", "x") }], from: [{ db: null, table: "Foo", as: "a" }] }], createLogger({ quiet: true, sinks: [sink] }));

    expect(trees[0]).toBeNull();
    expect(trees[1] ? extractStatementReferences(trees[1]) : null).toEqual(["Foo.x"]);
    expect(sink.lines).toEqual(["WARNING - Statement #1 could not be converted: unreadable column list"]);
  });
});
