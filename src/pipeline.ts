import { errorMessage, ParseFailure, StatementProcessingError } from "./errors";
import { fallbackExtract } from "./fallback-tokenizer";
import { Logger, logger as defaultLogger } from "./logger";
import { BuildOptions, extractStatementReferences } from "./reference-builder";
import { DEFAULT_DIALECT, MULTI_DIALECT_ORDER, NodeSqlParser, normalizeDialect, StructuralParser } from "./sql-parser";
import type { StatementTree } from "./sql-tree";

export type ExtractionStatus = "SUCCESS" | "PARTIAL_OK" | "PARSE_ERROR" | "ZERO_COLUMNS";

export interface ExtractOptions extends Partial<BuildOptions> {
  /** Dialect used when multi-dialect mode is off. */
  dialect?: string;
  multiDialect?: boolean;
  /** Trial order for multi-dialect mode. */
  dialects?: readonly string[];
  parser?: StructuralParser;
  logger?: Logger;
}

export interface DialectAttempt {
  dialect: string;
  outcome: "parsed" | "failed";
  references: number;
  error?: ParseFailure;
}

export interface StatementFailure {
  dialect: string;
  /** 1-based position of the statement in the text. */
  statementIndex: number;
  error: StatementProcessingError;
}

export type StatementResult =
  | { ok: true; references: string[] }
  | { ok: false; error: StatementProcessingError };

export interface ExtractionOutcome {
  references: string[];
  status: ExtractionStatus;
  /** Which extractor produced `references`. */
  source: "structural" | "fallback" | "none";
  /** Dialect of the structural parse the result is based on, if any parsed. */
  dialect: string | null;
  attempts: DialectAttempt[];
  statementFailures: StatementFailure[];
}

let sharedParser: NodeSqlParser | undefined;

function defaultParser(): NodeSqlParser {
  sharedParser ??= new NodeSqlParser();
  return sharedParser;
}

export function resolveTrialDialects(options: Pick<ExtractOptions, "dialect" | "multiDialect" | "dialects">): string[] {
  if (!options.multiDialect) {
    return [normalizeDialect(options.dialect ?? DEFAULT_DIALECT)];
  }
  const list = options.dialects && options.dialects.length > 0 ? options.dialects : MULTI_DIALECT_ORDER;
  return [...new Set(list.map(normalizeDialect))];
}

export function processStatement(tree: StatementTree, options: BuildOptions): StatementResult {
  try {
    return { ok: true, references: extractStatementReferences(tree, options) };
  } catch (err) {
    const error = err instanceof StatementProcessingError ? err : new StatementProcessingError(errorMessage(err), { cause: err });
    return { ok: false, error };
  }
}

/**
 * Extract qualified column references from one SQL text unit: structural
 * parse per dialect first, the fallback tokenizer when that yields nothing.
 */
export function extractReferences(text: string, options: ExtractOptions = {}): ExtractionOutcome {
  const log = options.logger ?? defaultLogger;
  const parser = options.parser ?? defaultParser();
  const build: BuildOptions = {
    resolveUnqualified: options.resolveUnqualified ?? true,
    unresolvedPolicy: options.unresolvedPolicy ?? "drop",
  };

  const attempts: DialectAttempt[] = [];
  const statementFailures: StatementFailure[] = [];
  let parsedDialect: string | null = null;

  for (const dialect of resolveTrialDialects(options)) {
    let statements: Array<StatementTree | null>;
    try {
      statements = parser.parse(text, dialect);
    } catch (err) {
      const error = err instanceof ParseFailure ? err : new ParseFailure(errorMessage(err), dialect, null, null, { cause: err });
      attempts.push({ dialect, outcome: "failed", references: 0, error });
      log.debug(`parse failed (${dialect}): ${error.message}`);
      continue;
    }

    if (statements.length > 0 && statements.every(s => s === null)) {
      attempts.push({ dialect, outcome: "failed", references: 0, error: new ParseFailure("No statement could be parsed", dialect) });
      log.debug(`parse produced only empty statements (${dialect})`);
      continue;
    }

    const references: string[] = [];
    statements.forEach((tree, i) => {
      if (!tree) { return; }
      const result = processStatement(tree, build);
      if (result.ok) {
        references.push(...result.references);
        return;
      }
      statementFailures.push({ dialect, statementIndex: i + 1, error: result.error });
      log.warn(`Statement #${i + 1} skipped (${dialect}): ${result.error.message}`);
    });

    attempts.push({ dialect, outcome: "parsed", references: references.length });
    if (references.length > 0) {
      return { references, status: "SUCCESS", source: "structural", dialect, attempts, statementFailures };
    }
    parsedDialect ??= dialect;
  }

  const fallback = fallbackExtract(text);
  if (fallback.length > 0) {
    log.debug(`fallback tokenizer recovered ${fallback.length} reference(s)`);
    return { references: fallback, status: "PARTIAL_OK", source: "fallback", dialect: parsedDialect, attempts, statementFailures };
  }

  const status: ExtractionStatus = attempts.some(a => a.outcome === "failed") ? "PARSE_ERROR" : "ZERO_COLUMNS";
  return { references: [], status, source: "none", dialect: parsedDialect, attempts, statementFailures };
}
