import { TextDocument } from "vscode-languageserver-textdocument";
import { ParseFailure } from "./errors";
import { MULTI_DIALECT_ORDER } from "./sql-parser";

const CONTEXT_RADIUS = 2;

export interface ParseErrorContext {
  dialect?: string | null;
  /** 1-based statement number, when the error belongs to one statement. */
  statementIndex?: number | null;
  /** Label for the header; defaults to the error's name. */
  label?: string;
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1B\[[0-9;]*m/g, "").replace(/\[[0-9;]*m/g, "");
}

function numberAfter(re: RegExp, s: string): number | null {
  const m = re.exec(s);
  return m ? parseInt(m[1], 10) : null;
}

function locate(error: Error, message: string): { line: number | null; column: number | null } {
  if (error instanceof ParseFailure && (error.line !== null || error.column !== null)) {
    return { line: error.line, column: error.column };
  }
  return {
    line: numberAfter(/\bline\s+(\d+)/i, message),
    column: numberAfter(/\bcol(?:umn)?\s+(\d+)/i, message),
  };
}

/**
 * Lines around `line` (1-based), the failing one marked with ">>>".
 */
export function contextLines(sql: string, line: number, radius = CONTEXT_RADIUS): string[] {
  const doc = TextDocument.create("untitled:statement.sql", "sql", 1, sql);
  if (line < 1 || line > doc.lineCount) { return []; }
  const out: string[] = [];
  const first = Math.max(1, line - radius);
  const last = Math.min(doc.lineCount, line + radius);
  for (let n = first; n <= last; n++) {
    const text = doc.getText({ start: { line: n - 1, character: 0 }, end: { line: n, character: 0 } }).replace(/\r?\n$/, "");
    const prefix = n === line ? ">>> " : "    ";
    out.push(`${prefix}${String(n).padStart(4)}: ${text}`);
  }
  return out;
}

export function suggestionsFor(message: string, dialect: string | null): string[] {
  const m = message.toLowerCase();
  const out: string[] = [];
  if (m.includes("unexpected") || m.includes("syntax") || m.includes("expected")) {
    out.push("Check for missing commas, parentheses, or quotes");
    out.push("Verify SQL syntax matches the specified dialect");
    out.push("Check for unclosed quotes or parentheses");
  }
  if (m.includes("unknown") || m.includes("invalid") || m.includes("not supported")) {
    out.push("Verify table/column names are correct");
    out.push("Check for reserved keywords that need quoting");
    out.push("Ensure dialect-specific syntax is correct");
  }
  if (!dialect || out.length === 0) {
    out.push(`Try another dialect: --dialect ${MULTI_DIALECT_ORDER.join("|")}, or --multi-dialect`);
  }
  return out;
}

/**
 * Human-readable report for a parse or statement error, with the failing
 * line in context when the location is known.
 */
export function formatParseError(error: Error, sql: string, context: ParseErrorContext = {}): string {
  const dialect = context.dialect ?? (error instanceof ParseFailure ? error.dialect : null);
  const message = stripAnsi(error.message);
  const { line, column } = locate(error, message);

  const out: string[] = [`Parse Error (${context.label ?? error.name})`];
  if (context.statementIndex) { out.push(`Statement #${context.statementIndex}`); }
  out.push(`Dialect: ${dialect ?? "unspecified"}`);
  out.push("");
  out.push(`Error: ${message}`);
  if (line !== null) { out.push(`Line: ${line}`); }
  if (column !== null) { out.push(`Column: ${column}`); }

  const excerpt = line !== null ? contextLines(sql, line) : [];
  if (excerpt.length > 0) {
    out.push("", "Context:", ...excerpt);
  }

  out.push("", "Suggestions:", ...suggestionsFor(message, dialect).map(s => `  - ${s}`));
  return out.join("\n");
}
