import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverSqlFiles, parseReportName, processFile, runBatch } from "../batch";
import { createLogger, memorySink } from "../logger";
import { NodeSqlParser } from "../sql-parser";

const parser = new NodeSqlParser();
const quiet = createLogger({ quiet: true });

let dir: string;

function write(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf8");
  return file;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "colref-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("parseReportName", () => {
  it("splits on the first double underscore", () => {
    expect(parseReportName("/sql/Sales__Q1.sql")).toEqual({ report: "Sales", dataset: "Q1" });
    expect(parseReportName("a__b__c.sql")).toEqual({ report: "a", dataset: "b__c" });
    expect(parseReportName("Plain.SQL")).toEqual({ report: "Plain", dataset: "Default" });
    expect(parseReportName("Rep__.sql")).toEqual({ report: "Rep", dataset: "Default" });
  });
});

describe("discoverSqlFiles", () => {
  it("searches directories recursively and reports what it skips", async () => {
    const a = write("a.sql", "SELECT 1");
    const b = write("sub/b.SQL", "SELECT 1");
    const notes = write("notes.txt", "");
    const missing = path.join(dir, "missing");
    const sink = memorySink();

    const files = await discoverSqlFiles([dir, missing, notes, a], createLogger({ quiet: true, sinks: [sink] }));

    expect(files).toEqual([a, b]);
    expect(sink.lines).toEqual([
      `INFO - Found 2 SQL file(s) in ${dir}`,
      `WARNING - Path not found: ${missing}`,
      `WARNING - Skipping non-SQL file: ${notes}`,
    ]);
  });
});

describe("processFile", () => {
  it("returns unique references in first-seen order", () => {
    const file = write("Sales__Q1.sql", "SELECT a.x, a.x FROM Foo a");
    const result = processFile(file, { parser, logger: quiet, cwd: dir });
    expect(result).toMatchObject({
      file: "Sales__Q1.sql",
      source: file,
      report: "Sales",
      dataset: "Q1",
      references: ["Foo.x"],
      totalExtracted: 2,
      wildcardsFiltered: 0,
      status: "SUCCESS",
      dialect: "transactsql",
      diagnostics: [],
    });
  });

  it("skips files with nothing to parse", () => {
    const sink = memorySink();
    const log = createLogger({ quiet: true, sinks: [sink] });
    const empty = processFile(write("empty.sql", "  \n"), { parser, logger: log, cwd: dir });
    const ddl = processFile(write("ddl.sql", "CREATE TABLE T (id INT);"), { parser, logger: log, cwd: dir });
    expect(empty.status).toBeNull();
    expect(ddl.status).toBeNull();
    expect(ddl.references).toEqual([]);
    expect(sink.lines).toEqual([
      "WARNING - File empty.sql is empty",
      "WARNING - File ddl.sql contains only comments/DDL (no query statements)",
    ]);
  });

  it("records parse diagnostics when nothing parses", () => {
    const result = processFile(write("Broken.sql", "SELEC nothing here"), { parser, logger: quiet, cwd: dir });
    expect(result.status).toBe("PARSE_ERROR");
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ dialect: "transactsql", statementIndex: null });
    expect(result.diagnostics[0].formatted.split("\n")[0]).toBe("Parse Error (ParseFailure)");
  });
});

describe("runBatch", () => {
  it("keeps going after a file fails", () => {
    const good = write("Sales__Q1.sql", "SELECT a.x FROM Foo a");
    const empty = write("empty.sql", "");
    const missing = path.join(dir, "missing.sql");

    const result = runBatch([good, empty, missing], { parser, logger: quiet, cwd: dir });

    expect(result.rows).toEqual([{ report: "Sales", dataset: "Q1", column: "Foo.x" }]);
    expect(result.successful).toEqual(["Sales__Q1.sql"]);
    expect(result.zeroColumn.map(z => z.file)).toEqual(["empty.sql"]);
    expect(result.failed).toHaveLength(1);
    expect(result.failed[0].file).toBe("missing.sql");
    expect(result.failed[0].source).toBe(missing);
    expect(result.summary).toMatchObject({
      totalFiles: 3,
      successful: 1,
      zeroColumns: 1,
      failed: 1,
      totalReferences: 1,
      uniqueReferences: 1,
      statuses: { SUCCESS: 1, PARTIAL_OK: 0, PARSE_ERROR: 0, ZERO_COLUMNS: 0 },
    });
  });
});
